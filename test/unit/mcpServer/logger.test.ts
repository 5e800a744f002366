import { Writable } from 'stream';
import Logger, { errorMessage } from '../../../src/mcpServer/logger';

class Capture extends Writable {
  lines: string[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.lines.push(chunk.toString());
    callback();
  }
}

describe('Logger', () => {
  let out: Capture;

  beforeEach(() => {
    out = new Capture();
    Logger.setOutput(out);
    Logger.disableMemoryHook();
    Logger.setLevel('info');
    Logger.setJson(false);
  });

  afterEach(() => {
    Logger.setOutput(process.stderr);
    Logger.disableMemoryHook();
    Logger.setJson(false);
  });

  it('respects log level', () => {
    Logger.enableMemoryHook();
    Logger.setLevel('warn');
    Logger.info('should not appear');
    Logger.warn('should appear');
    expect(Logger.getMemory().map(m => m.msg)).toEqual(['should appear']);
  });

  it('ignores unknown level names', () => {
    Logger.setLevel('verbose');
    Logger.enableMemoryHook();
    Logger.debug('hidden');
    Logger.info('shown');
    expect(Logger.getMemory().map(m => m.level)).toEqual(['info']);
  });

  it('keeps correlation id and extra data', () => {
    Logger.enableMemoryHook();
    Logger.info('json test', 'cid-1', { a: 1 });
    const [rec] = Logger.getMemory();
    expect(rec.correlationId).toBe('cid-1');
    expect(rec.extra).toEqual({ a: 1 });
  });

  it('writes plain text lines', () => {
    Logger.error('boom', 'cid-2', { code: 7 });
    expect(out.lines).toHaveLength(1);
    expect(out.lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] ERROR: boom cid=cid-2 \{"code":7\}\n$/);
  });

  it('writes JSON lines when enabled', () => {
    Logger.setJson(true);
    Logger.warn('careful');
    const parsed: unknown = JSON.parse(out.lines[0]);
    expect(parsed).toMatchObject({ level: 'warn', msg: 'careful', correlationId: null, extra: null });
  });

  it('renders thrown values as messages', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});
