/**
 * bulkline Runner Tests
 */

import { Readable, Writable } from 'stream';
import { InMemoryFileSystem } from '../../consumers/file-system';
import { loadConfig } from '../../config';
import { createConsumers, run, toOverrides } from '../run';

function collect(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('toOverrides', () => {
  it('should map arguments and flags', () => {
    expect(
      toOverrides('4', {
        logDir: '/out',
        maxConcurrency: '2',
        strictBlocks: true,
        files: false,
        debug: true,
      })
    ).toEqual({
      bulkSize: 4,
      logDir: '/out',
      maxConcurrency: 2,
      unbalancedBlocks: 'reject',
      writeFiles: false,
      debug: true,
    });
  });

  it('should leave unset options out', () => {
    expect(toOverrides(undefined, { files: true })).toEqual({});
  });

  it('should reject a non-numeric bulk size', () => {
    expect(() => toOverrides('three', {})).toThrow('Invalid bulkSize: three (expected a positive integer)');
  });
});

describe('createConsumers', () => {
  it('should add the file consumer only when files are enabled', () => {
    const out = collect();
    const withFiles = createConsumers(loadConfig({}, {}), { output: out.stream });
    const withoutFiles = createConsumers(loadConfig({ writeFiles: false }, {}), { output: out.stream });

    expect(withFiles.map(c => c.name)).toEqual(['console', 'file']);
    expect(withoutFiles.map(c => c.name)).toEqual(['console']);
  });
});

describe('run', () => {
  it('should print bulks and flush the remainder at end of input', async () => {
    const out = collect();
    const config = loadConfig({ bulkSize: 3, writeFiles: false }, {});

    const summary = await run(config, {
      input: Readable.from(['cmd1\ncmd2\ncmd3\ncmd4\ncmd5\n']),
      output: out.stream,
    });

    expect(out.text()).toBe('bulk: cmd1, cmd2, cmd3\nbulk: cmd4, cmd5\n');
    expect(summary.lines).toBe(5);
    expect(summary.commands).toBe(5);
    expect(summary.flushes).toBe(2);
    expect(summary.failures).toBe(0);
    expect(summary.final?.reason).toBe('shutdown');
  });

  it('should print dynamic blocks as single bulks', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const out = collect();
    const config = loadConfig({ bulkSize: 2, writeFiles: false }, {});

    await run(config, {
      input: Readable.from(['a\n{\nb\nc\nd\n}\ne\n{\nf\n']),
      output: out.stream,
    });

    // The block left open at end of input is dropped
    expect(out.text()).toBe('bulk: a\nbulk: b, c, d\nbulk: e\n');
    expect(warnSpy).toHaveBeenCalledWith('[BulkEngine] Discarding 1 command(s) of an unterminated block');
    warnSpy.mockRestore();
  });

  it('should write one file per bulk', async () => {
    const out = collect();
    const fileSystem = new InMemoryFileSystem();
    const config = loadConfig({ bulkSize: 2, logDir: '/logs' }, {});

    await run(config, {
      input: Readable.from(['a\nb\nc\n']),
      output: out.stream,
      fileSystem,
    });

    const files = await fileSystem.list('/logs');
    expect(files).toHaveLength(2);
    const contents = await Promise.all(files.map(file => fileSystem.read(`/logs/${file}`)));
    expect(contents.sort()).toEqual(['bulk: a, b', 'bulk: c']);
  });

  it('should flush what was read before an ingestion error', async () => {
    const out = collect();
    const config = loadConfig({ bulkSize: 5, writeFiles: false, unbalancedBlocks: 'reject' }, {});

    await expect(
      run(config, { input: Readable.from(['a\nb\n}\nc\n']), output: out.stream })
    ).rejects.toThrow('End of block without a matching start of block');

    expect(out.text()).toBe('bulk: a, b\n');
  });
});
