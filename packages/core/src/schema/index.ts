export { tasks } from './tasks.js';
export type { TaskRow } from './tasks.js';
