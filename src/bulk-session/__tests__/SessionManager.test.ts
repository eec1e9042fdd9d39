/**
 * SessionManager Tests
 */

import type { Batch, Consumer } from '../../bulk-engine/types';
import { InvalidBulkSizeError, UnbalancedBlockError } from '../../bulk-engine/types';
import { SessionManager, defaultConsumerFactory, generateHandle } from '../SessionManager';
import { SessionNotFoundError } from '../types';

class Collector implements Consumer {
  bulks: string[][] = [];
  private current: Batch = [];

  update(batch: Batch): void {
    this.current = batch;
  }

  process(): void {
    this.bulks.push(this.current.map(c => c.text));
  }
}

describe('SessionManager', () => {
  let collectors: Collector[];
  let manager: SessionManager;

  beforeEach(() => {
    collectors = [];
    manager = new SessionManager({
      consumerFactory: () => {
        const collector = new Collector();
        collectors.push(collector);
        return [collector];
      },
    });
  });

  it('should hand out unique handles', () => {
    const first = manager.connect(3);
    const second = manager.connect(3);

    expect(first).toMatch(/^bulk_[0-9a-z]{12}$/);
    expect(second).not.toBe(first);
    expect(manager.size).toBe(2);
    expect(manager.has(first)).toBe(true);
  });

  it('should keep sessions independent', async () => {
    const a = manager.connect(2);
    const b = manager.connect(2);

    await manager.receive(a, 'a1\n');
    await manager.receive(b, 'b1\nb2\n');
    await manager.receive(a, 'a2\n');

    expect(collectors[0].bulks).toEqual([['a1', 'a2']]);
    expect(collectors[1].bulks).toEqual([['b1', 'b2']]);
  });

  it('should flush pending commands on disconnect', async () => {
    const handle = manager.connect(3);
    await manager.receive(handle, 'cmd1\ncmd2\n');

    expect(await manager.disconnect(handle)).toBe(true);

    expect(collectors[0].bulks).toEqual([['cmd1', 'cmd2']]);
    expect(manager.has(handle)).toBe(false);
  });

  it('should reject input for unknown handles', async () => {
    await expect(manager.receive('bulk_missing', 'x')).rejects.toThrow(SessionNotFoundError);
    await expect(manager.receive('bulk_missing', 'x')).rejects.toMatchObject({
      code: 'SESSION_NOT_FOUND',
    });
    expect(await manager.disconnect('bulk_missing')).toBe(false);
  });

  it('should not register a session with an invalid bulk size', () => {
    expect(() => manager.connect(0)).toThrow(InvalidBulkSizeError);
    expect(manager.size).toBe(0);
  });

  it('should disconnect every session', async () => {
    const a = manager.connect(5);
    const b = manager.connect(5);
    await manager.receive(a, 'x');
    await manager.receive(b, 'y');

    await manager.disconnectAll();

    expect(manager.size).toBe(0);
    expect(collectors.map(c => c.bulks)).toEqual([[['x']], [['y']]]);
  });

  it('should apply engine defaults and per-connection options', async () => {
    const strict = new SessionManager({
      consumerFactory: () => [],
      engineDefaults: { unbalancedBlocks: 'reject' },
    });
    const handle = strict.connect(2);

    await expect(strict.receive(handle, '}')).rejects.toThrow(UnbalancedBlockError);

    const own = new Collector();
    const custom = strict.connect(1, { consumers: [own] });
    await strict.receive(custom, 'z');
    expect(own.bulks).toEqual([['z']]);
  });

  it('should stamp commands with the configured clock', async () => {
    const stamps: number[] = [];
    const timed = new SessionManager({
      clock: () => 42,
      consumerFactory: () => [{
        update: batch => {
          stamps.push(...batch.map(c => c.createdAt));
        },
        process: jest.fn(),
      }],
    });
    const handle = timed.connect(1);

    await timed.receive(handle, 'a');

    expect(stamps).toEqual([42]);
  });

  it('should default to console and file consumers', () => {
    expect(defaultConsumerFactory().map(c => c.name)).toEqual(['console', 'file']);
  });

  it('should format handles', () => {
    expect(generateHandle()).toMatch(/^bulk_[0-9a-z]{12}$/);
  });
});
