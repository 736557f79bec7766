import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { FileTaskStore } from '../../src/stores/file-store.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { PersistenceError } from '../../src/errors.js';
import { withContent, withStatus } from '../../src/records/task-record.js';
import { captureLogger, makeTempDir, removeDir } from '../support.js';

let tmpDir: string;
let filePath: string;
const now = new Date(2024, 2, 10, 12, 0, 0);
const clock = () => now;

beforeEach(() => {
  tmpDir = makeTempDir('taskkeeper-file-store-');
  filePath = join(tmpDir, 'tasks.json');
});

afterEach(() => {
  removeDir(tmpDir);
});

describe('FileTaskStore load', () => {
  it('starts empty when the file is missing and does not create it', () => {
    const store = new FileTaskStore({ filePath, clock });
    expect(store.readAll()).toEqual([]);
    expect(existsSync(filePath)).toBe(false);
  });

  it('falls back to an empty store with a warning on malformed JSON', () => {
    writeFileSync(filePath, '{ this is not json');
    const { logger, lines } = captureLogger();

    const store = new FileTaskStore({ filePath, logger, clock });

    expect(store.readAll()).toEqual([]);
    const warning = lines.find(l => l.level === 40);
    expect(warning?.msg).toBe('Could not load task file, starting with no tasks');
    expect(warning?.module).toBe('file-store');
  });

  it('treats a document with an invalid record as malformed', () => {
    writeFileSync(filePath, JSON.stringify([{ id: 1, title: 'x', description: 'y', status: 'Done', created_date: '2024-03-10 12:00:00' }]));
    const { logger, lines } = captureLogger();

    const store = new FileTaskStore({ filePath, logger, clock });

    expect(store.readAll()).toEqual([]);
    expect(lines.some(l => l.level === 40)).toBe(true);
  });

  it('creates missing parent directories on first save', () => {
    const nested = join(tmpDir, 'a', 'b', 'tasks.json');
    const store = new FileTaskStore({ filePath: nested, clock });
    store.add('a', 'a');
    expect(existsSync(nested)).toBe(true);
  });

  it('reloads the same records in a new instance', () => {
    const first = new FileTaskStore({ filePath, clock });
    first.add('Buy milk', 'Get 2% milk');
    const report = first.add('Write report', 'Quarterly report');
    first.update(withStatus(report, TaskStatus.Completed));

    const second = new FileTaskStore({ filePath });
    expect(second.readAll()).toEqual(first.readAll());
    expect(second.readById(2)?.status).toBe(TaskStatus.Completed);
  });
});

describe('FileTaskStore add', () => {
  it('assigns ids from 1 in insertion order', () => {
    const store = new FileTaskStore({ filePath, clock });
    const ids = ['a', 'b', 'c'].map(t => store.add(t, `${t} description`).id);
    expect(ids).toEqual([1, 2, 3]);
  });

  it('creates pending tasks stamped by the clock', () => {
    const store = new FileTaskStore({ filePath, clock });
    const task = store.add('Buy milk', 'Get 2% milk');
    expect(task).toEqual({
      id: 1,
      title: 'Buy milk',
      description: 'Get 2% milk',
      status: TaskStatus.Pending,
      createdDate: '2024-03-10 12:00:00',
    });
  });

  it('writes the document after each add', () => {
    const store = new FileTaskStore({ filePath, clock });
    store.add('Buy milk', 'Get 2% milk');

    expect(JSON.parse(readFileSync(filePath, 'utf8'))).toEqual([
      { id: 1, title: 'Buy milk', description: 'Get 2% milk', status: 'Pending', created_date: '2024-03-10 12:00:00' },
    ]);
  });

  it('continues from the highest id found in the file', () => {
    writeFileSync(filePath, JSON.stringify([
      { id: 4, title: 'a', description: 'a', status: 'Pending', created_date: '2024-03-09 08:00:00' },
      { id: 9, title: 'b', description: 'b', status: 'Completed', created_date: '2024-03-09 09:00:00' },
    ]));
    const store = new FileTaskStore({ filePath, clock });
    expect(store.add('c', 'c').id).toBe(10);
  });

  it('reuses the highest id after that task is deleted', () => {
    const store = new FileTaskStore({ filePath, clock });
    store.add('a', 'a');
    store.add('b', 'b');
    store.add('c', 'c');

    store.delete(3);
    expect(store.add('d', 'd').id).toBe(3);

    store.delete(2);
    expect(store.add('e', 'e').id).toBe(4);
  });
});

describe('FileTaskStore reads', () => {
  it('returns a snapshot that callers cannot use to change the store', () => {
    const store = new FileTaskStore({ filePath, clock });
    store.add('a', 'a');

    const snapshot = store.readAll();
    snapshot.pop();

    expect(store.readAll()).toHaveLength(1);
  });

  it('returns null for an unknown id', () => {
    const store = new FileTaskStore({ filePath, clock });
    expect(store.readById(42)).toBeNull();
  });
});

describe('FileTaskStore update', () => {
  it('replaces fields in place and persists them', () => {
    const store = new FileTaskStore({ filePath, clock });
    const task = store.add('Draft', 'First pass');
    store.add('Other', 'Other task');

    const updated = store.update(withStatus(withContent(task, 'Final', 'Second pass'), TaskStatus.Completed));

    expect(updated).toEqual({ ...task, title: 'Final', description: 'Second pass', status: TaskStatus.Completed });
    expect(store.readAll().map(t => t.id)).toEqual([1, 2]);
    expect(new FileTaskStore({ filePath }).readById(1)).toEqual(updated);
  });

  it('keeps the stored creation date', () => {
    const store = new FileTaskStore({ filePath, clock });
    const task = store.add('Draft', 'First pass');

    const updated = store.update({ ...task, createdDate: '1999-01-01 00:00:00' });

    expect(updated?.createdDate).toBe('2024-03-10 12:00:00');
  });

  it('returns null for an unknown id', () => {
    const store = new FileTaskStore({ filePath, clock });
    const task = store.add('a', 'a');
    expect(store.update({ ...task, id: 99 })).toBeNull();
  });
});

describe('FileTaskStore delete', () => {
  it('removes and returns the task', () => {
    const store = new FileTaskStore({ filePath, clock });
    const task = store.add('a', 'a');

    expect(store.delete(task.id)).toEqual(task);
    expect(store.readById(task.id)).toBeNull();
    expect(JSON.parse(readFileSync(filePath, 'utf8'))).toEqual([]);
  });

  it('returns null for an unknown id', () => {
    const store = new FileTaskStore({ filePath, clock });
    expect(store.delete(5)).toBeNull();
  });
});

describe('FileTaskStore search', () => {
  let store: FileTaskStore;

  beforeEach(() => {
    store = new FileTaskStore({ filePath, clock });
    store.add('Buy milk', 'Get 2% milk');
    const report = store.add('Write report', 'Quarterly report');
    store.update(withStatus(report, TaskStatus.Completed));
    store.add('Call plumber', 'Kitchen sink report');
  });

  it('matches title or description in store order', () => {
    expect(store.search('report').map(t => t.id)).toEqual([2, 3]);
  });

  it('ignores case', () => {
    expect(store.search('MILK').map(t => t.id)).toEqual([1]);
  });

  it('ignores case outside ASCII', () => {
    store.add('ÄRGER vermeiden', 'Notiz');
    expect(store.search('ärg').map(t => t.id)).toEqual([4]);
  });

  it('applies the status filter', () => {
    expect(store.search('report', TaskStatus.Pending).map(t => t.id)).toEqual([3]);
    expect(store.search('report', TaskStatus.Completed).map(t => t.id)).toEqual([2]);
  });
});

describe('FileTaskStore statistics', () => {
  it('counts statuses and tasks created on the clock day', () => {
    writeFileSync(filePath, JSON.stringify([
      { id: 1, title: 'old', description: 'from yesterday', status: 'Completed', created_date: '2024-03-09 23:59:59' },
    ]));
    const store = new FileTaskStore({ filePath, clock });
    store.add('a', 'a');
    store.add('b', 'b');

    expect(store.statistics()).toEqual({ total: 3, pending: 2, completed: 1, createdToday: 2 });
  });

  it('is all zeros for an empty store', () => {
    const store = new FileTaskStore({ filePath, clock });
    expect(store.statistics()).toEqual({ total: 0, pending: 0, completed: 0, createdToday: 0 });
  });
});

describe('FileTaskStore save failures', () => {
  it('raises PersistenceError with the cause after changing memory', () => {
    // A directory cannot be read or written as a file
    const { logger, lines } = captureLogger();
    const store = new FileTaskStore({ filePath: tmpDir, logger, clock });

    let caught: unknown;
    try {
      store.add('a', 'a');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PersistenceError);
    if (!(caught instanceof PersistenceError)) return;
    expect(caught.message).toMatch(/^Failed to save tasks: /);
    expect(caught.cause).toBeInstanceOf(Error);
    expect(store.readAll()).toHaveLength(1);
    expect(lines.some(l => l.level === 50 && l.msg === 'Error saving task data')).toBe(true);
  });
});
