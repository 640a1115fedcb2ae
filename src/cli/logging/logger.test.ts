import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { transports } from 'winston';
import { createLogger, shouldColor } from './logger';

async function readWhenWritten(file: string): Promise<string> {
  for (let attempt = 0; attempt < 50; attempt++) {
    const content = await fs.readFile(file, 'utf-8').catch(() => '');
    if (content.includes('\n')) {
      return content;
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
  throw new Error(`${file} was not written`);
}

describe('createLogger', () => {
  it('should log at info level by default', () => {
    const logger = createLogger({ color: false });

    expect(logger.level).toBe('info');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(transports.Console);
  });

  it('should log debug output when verbose', () => {
    expect(createLogger({ verbose: true, color: false }).level).toBe('debug');
  });

  it('should write plain timestamped lines to the log file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'backend-export-log-'));
    const logFile = path.join(dir, 'export.log');
    const logger = createLogger({ color: true, logFile });
    logger.transports[0].silent = true;

    try {
      logger.info('hello');
      const content = await readWhenWritten(logFile);

      expect(logger.transports).toHaveLength(2);
      expect(content).toMatch(/^\d{4}-\d\d-\d\d \d\d:\d\d:\d\d: INFO: hello$/m);
      expect(content).not.toContain('\x1b[');
    } finally {
      logger.close();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('shouldColor', () => {
  it('should color only on a terminal', () => {
    expect(shouldColor({ isTTY: true }, { TERM: 'xterm-256color' })).toBe(true);
    expect(shouldColor({ isTTY: false }, { TERM: 'xterm-256color' })).toBe(false);
    expect(shouldColor({}, {})).toBe(false);
  });

  it('should respect NO_COLOR and dumb terminals', () => {
    expect(shouldColor({ isTTY: true }, { NO_COLOR: '1' })).toBe(false);
    expect(shouldColor({ isTTY: true }, { TERM: 'dumb' })).toBe(false);
  });
});
