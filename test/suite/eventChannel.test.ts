import * as assert from 'assert';
import { suite, test } from 'mocha';

import { EventChannel } from '../../src/messaging/EventChannel';

interface SampleEvents {
  ping: { value: number };
  pong: { label: string };
}

suite('EventChannel', () => {
  test('delivers payloads to listeners in registration order', () => {
    const channel = new EventChannel<SampleEvents>();
    const received: string[] = [];

    channel.on('ping', ({ value }) => received.push(`first:${value}`));
    channel.on('ping', ({ value }) => received.push(`second:${value}`));
    channel.on('pong', ({ label }) => received.push(`pong:${label}`));

    channel.fire('ping', { value: 1 });
    channel.fire('pong', { label: 'x' });

    assert.deepStrictEqual(received, ['first:1', 'second:1', 'pong:x']);
  });

  test('stops delivering to a disposed subscription', () => {
    const channel = new EventChannel<SampleEvents>();
    const received: number[] = [];

    const subscription = channel.on('ping', ({ value }) => received.push(value));
    channel.fire('ping', { value: 1 });
    subscription.dispose();
    subscription.dispose();
    channel.fire('ping', { value: 2 });

    assert.deepStrictEqual(received, [1]);
    assert.strictEqual(channel.listenerCount('ping'), 0);
  });

  test('once listeners fire a single time', () => {
    const channel = new EventChannel<SampleEvents>();
    const received: number[] = [];

    channel.once('ping', ({ value }) => received.push(value));
    channel.fire('ping', { value: 1 });
    channel.fire('ping', { value: 2 });

    assert.deepStrictEqual(received, [1]);
  });

  test('reports listener failures without interrupting delivery', () => {
    const failures: string[] = [];
    const channel = new EventChannel<SampleEvents>((event, error) => {
      failures.push(`${String(event)}:${error instanceof Error ? error.message : String(error)}`);
    });
    const received: number[] = [];

    channel.on('ping', () => {
      throw new Error('listener failed');
    });
    channel.on('ping', ({ value }) => received.push(value));
    channel.fire('ping', { value: 7 });

    assert.deepStrictEqual(failures, ['ping:listener failed']);
    assert.deepStrictEqual(received, [7]);
  });

  test('drops every listener on dispose and ignores later registrations', () => {
    const channel = new EventChannel<SampleEvents>();
    const received: number[] = [];

    channel.on('ping', ({ value }) => received.push(value));
    channel.dispose();
    channel.on('ping', ({ value }) => received.push(value));
    channel.fire('ping', { value: 1 });

    assert.deepStrictEqual(received, []);
    assert.strictEqual(channel.listenerCount('ping'), 0);
  });
});
