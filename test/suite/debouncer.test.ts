import * as assert from 'assert';
import { suite, test } from 'mocha';

import { Debouncer } from '../../src/services/Debouncer';
import { delay } from '../../src/utils/async';

suite('Debouncer', () => {
  test('dispatches only the last payload submitted within the window', async () => {
    const dispatched: Array<[string, string]> = [];
    const debouncer = new Debouncer<string>(20, (taskId, payload) => dispatched.push([taskId, payload]));

    debouncer.submit('task-1', 'a');
    debouncer.submit('task-2', 'ab');
    debouncer.submit('task-3', 'abc');

    assert.strictEqual(debouncer.pendingTaskId, 'task-3');

    await delay(50);

    assert.deepStrictEqual(dispatched, [['task-3', 'abc']]);
    assert.strictEqual(debouncer.pendingTaskId, undefined);
  });

  test('restarts the delay on every submission', async () => {
    const dispatched: string[] = [];
    const debouncer = new Debouncer<string>(40, (_taskId, payload) => dispatched.push(payload));

    debouncer.submit('task-1', 'first');
    await delay(25);
    debouncer.submit('task-2', 'second');
    await delay(25);

    assert.deepStrictEqual(dispatched, []);

    await delay(40);

    assert.deepStrictEqual(dispatched, ['second']);
  });

  test('cancel drops the pending payload and reports its task', async () => {
    const dispatched: string[] = [];
    const debouncer = new Debouncer<string>(10, (_taskId, payload) => dispatched.push(payload));

    debouncer.submit('task-1', 'dropped');

    assert.strictEqual(debouncer.cancel(), 'task-1');
    assert.strictEqual(debouncer.cancel(), undefined);

    await delay(30);
    assert.deepStrictEqual(dispatched, []);
  });

  test('refuses submissions after dispose', () => {
    const debouncer = new Debouncer<string>(10, () => undefined);

    debouncer.submit('task-1', 'pending');
    debouncer.dispose();

    assert.strictEqual(debouncer.pendingTaskId, undefined);
    assert.throws(() => debouncer.submit('task-2', 'late'), /Debouncer has been disposed\./);
  });
});
