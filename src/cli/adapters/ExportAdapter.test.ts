import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RequestInit, Response } from 'node-fetch';
import { createLogger, transports } from 'winston';
import { ConfigError, TransportError } from '../../core/errors';
import { CsvBackendWriter } from '../writers/CsvBackendWriter';
import { applyOverrides, ExportAdapter, exitCodeFor } from './ExportAdapter';

const BASE = 'https://controller.example.com';

const json = (body: unknown): Response => new Response(JSON.stringify(body));

const metricsUrl = (id: number, metricPath: string) =>
  `${BASE}/controller/rest/applications/${id}/metrics?output=json&metric-path=${encodeURIComponent(metricPath)}`;

const folders = (...names: string[]) => names.map(name => ({ name, type: 'folder' }));

/**
 * Serves a fixed controller: AppA(1) with tier T1 and one backend, AppB(2) with an empty tier T2
 */
function createController(failing: number[] = []) {
  const routes = new Map<string, () => Response>([
    [`${BASE}/controller/api/oauth/access_token`, () => json({ access_token: 'test-token' })],
    [
      `${BASE}/controller/rest/applications?output=json`,
      () =>
        json([
          { name: 'AppA', id: 1 },
          { name: 'Billing', id: 3 },
          { name: 'AppB', id: 2 },
        ]),
    ],
    [metricsUrl(1, 'Overall Application Performance'), () => json(folders('T1'))],
    [
      metricsUrl(1, 'Overall Application Performance|T1|External Calls'),
      () => json(folders('Call-JDBC to DB - ordersdb')),
    ],
    [metricsUrl(2, 'Overall Application Performance'), () => json(folders('T2'))],
  ]);

  return jest.fn(async (url: string, _init?: RequestInit) => {
    if (failing.some(id => url.startsWith(`${BASE}/controller/rest/applications/${id}/`))) {
      return new Response('unavailable', { status: 503 });
    }
    const route = routes.get(url);
    return route ? route() : json([]);
  });
}

const HEADER = 'application_name,tier_name,backend_type,backend_name\n';

const logger = createLogger({ transports: [new transports.Console({ silent: true })] });

describe('ExportAdapter', () => {
  let dir: string;
  let configFile: string;
  let outputFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'backend-export-run-'));
    configFile = path.join(dir, 'exporter.yaml');
    outputFile = path.join(dir, 'backends.csv');
    await fs.writeFile(
      configFile,
      [
        `appd_url: ${BASE}`,
        'appd_account: customer1',
        'appd_api_user: exporter',
        'appd_api_secret: test-secret',
        "application_names: '^App'",
        "backend_type: '.*'",
        'skip_thread_tasks: false',
        `output_file: ${outputFile}`,
      ].join('\n')
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should export backends of matching applications', async () => {
    const fetch = createController();
    const adapter = new ExportAdapter({ fetch, logger, env: {} });

    const summary = await adapter.run({ config: configFile }, logger);

    expect(await fs.readFile(outputFile, 'utf-8')).toBe(
      'application_name,tier_name,backend_type,backend_name\nAppA,T1,JDBC,ordersdb\n'
    );
    expect(summary).toEqual({
      applications: 2,
      tiers: 2,
      backends: 1,
      failedApplications: [],
    });
    expect(fetch.mock.calls[1][1]).toMatchObject({
      headers: { Authorization: 'Bearer test-token' },
    });
  });

  it('should keep rows of earlier applications when a later one fails', async () => {
    const adapter = new ExportAdapter({ fetch: createController([2]), logger, env: {} });

    await expect(adapter.run({ config: configFile }, logger)).rejects.toThrow(TransportError);

    expect(await fs.readFile(outputFile, 'utf-8')).toBe(
      'application_name,tier_name,backend_type,backend_name\nAppA,T1,JDBC,ordersdb\n'
    );
  });

  it('should honour command-line overrides', async () => {
    const fetch = createController([2]);
    const override = path.join(dir, 'override.csv');
    const adapter = new ExportAdapter({ fetch, logger, env: {} });

    const summary = await adapter.run(
      { config: configFile, output: override, skipThreadTasks: true, continueOnError: true },
      logger
    );

    expect(summary.failedApplications).toEqual(['AppB']);
    expect(await fs.readFile(override, 'utf-8')).toBe(
      'application_name,tier_name,backend_type,backend_name\nAppA,T1,JDBC,ordersdb\n'
    );
    expect(fetch.mock.calls.map(call => call[0])).not.toContain(
      metricsUrl(1, 'Overall Application Performance|T1|Thread Tasks')
    );
  });

  it('should fail on invalid configuration before any request', async () => {
    await fs.writeFile(configFile, `appd_url: ${BASE}\n`);
    const fetch = createController();
    const adapter = new ExportAdapter({ fetch, logger, env: {} });

    await expect(adapter.run({ config: configFile }, logger)).rejects.toThrow(ConfigError);
    expect(fetch).not.toHaveBeenCalled();
    await expect(fs.access(outputFile)).rejects.toThrow();
  });

  it('should set the exit code when execution fails', async () => {
    await fs.writeFile(configFile, `appd_url: ${BASE}\n`);
    const adapter = new ExportAdapter({ fetch: createController(), logger, env: {} });

    await adapter.execute({ config: configFile });

    expect(process.exitCode).toBe(2);
    process.exitCode = 0;
  });

  it('should close the writer when the header cannot be written', async () => {
    const open = jest
      .spyOn(CsvBackendWriter.prototype, 'open')
      .mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));
    const close = jest.spyOn(CsvBackendWriter.prototype, 'close');
    const adapter = new ExportAdapter({ fetch: createController(), logger, env: {} });

    try {
      await expect(adapter.run({ config: configFile }, logger)).rejects.toThrow('ENOSPC');
      expect(close).toHaveBeenCalledTimes(1);
    } finally {
      open.mockRestore();
      close.mockRestore();
    }
  });

  describe.each([
    ['SIGINT', 130],
    ['SIGTERM', 143],
  ] as const)('on %s', (signal, code) => {
    it(`should close the output file and exit with ${code}`, async () => {
      let resolveExit: (code: unknown) => void = () => undefined;
      const exited = new Promise<unknown>(resolve => {
        resolveExit = resolve;
      });
      const exit = jest.spyOn(process, 'exit').mockImplementation(((exitCode?: number) => {
        resolveExit(exitCode);
        return undefined as never;
      }) as typeof process.exit);
      const close = jest.spyOn(CsvBackendWriter.prototype, 'close');

      let reached: () => void = () => undefined;
      const waiting = new Promise<void>(resolve => {
        reached = resolve;
      });
      let release: (response: Response) => void = () => undefined;
      const controller = createController();
      const fetch = jest.fn(async (url: string, init?: RequestInit) => {
        if (url === metricsUrl(1, 'Overall Application Performance')) {
          reached();
          return new Promise<Response>(resolve => {
            release = resolve;
          });
        }
        return controller(url, init);
      });

      const baseline = process.listeners(signal);
      const listenerCounts = [process.listenerCount('SIGINT'), process.listenerCount('SIGTERM')];
      const adapter = new ExportAdapter({ fetch, logger, env: {} });

      try {
        const running = adapter.execute({ config: configFile });
        await waiting;

        const handlers = process.listeners(signal).filter(handler => !baseline.includes(handler));
        expect(handlers).toHaveLength(1);
        handlers[0](signal);

        expect(await exited).toBe(code);
        expect(close).toHaveBeenCalled();
        expect(await fs.readFile(outputFile, 'utf-8')).toBe(HEADER);

        release(new Response('unavailable', { status: 503 }));
        await running;

        expect([process.listenerCount('SIGINT'), process.listenerCount('SIGTERM')]).toEqual(
          listenerCounts
        );
      } finally {
        process.exitCode = 0;
        exit.mockRestore();
        close.mockRestore();
      }
    });
  });

  describe('applyOverrides', () => {
    it('should only replace entries for flags that are set', () => {
      expect(
        applyOverrides({ output_file: 'a.csv', skip_thread_tasks: 'false' }, { config: 'x' })
      ).toEqual({ output_file: 'a.csv', skip_thread_tasks: 'false' });
      expect(
        applyOverrides({ output_file: 'a.csv' }, { config: 'x', output: 'b.csv', quoteFields: true })
      ).toEqual({ output_file: 'b.csv', quote_fields: true });
    });
  });

  describe('exitCodeFor', () => {
    it('should map error classes to exit codes', () => {
      expect(exitCodeFor(new ConfigError(['missing']))).toBe(2);
      expect(exitCodeFor(new TransportError('down', BASE))).toBe(4);
      expect(exitCodeFor(new Error('boom'))).toBe(1);
    });
  });
});
