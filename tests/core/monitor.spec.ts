import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { startMonitor } from '../../src/core/monitor.js';
import { ConfigurationError, buildMonitorConfig } from '../../src/config/monitor-config.js';
import type { FetchFn } from '../../src/services/ntfy-client.js';
import type { NotificationPayload } from '../../src/types/notification.js';
import type { MonitorConfig } from '../../src/types/config.js';
import { MemoryEventSource } from '../harness/memory-event-source.js';
import { FIXED_NOW, FIXED_STAMP, captureLogger } from '../harness/logger.js';

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'folder-notify-monitor-'));
  await writeFile(path.join(tmpDir, 'report.pdf'), Buffer.alloc(2048));
});

afterAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

/** Relay stand-in that records every published body and answers with `statuses` in turn. */
function createRelay(statuses: number[] = []) {
  const published: NotificationPayload[] = [];
  const fetchFn = vi.fn<FetchFn>(async (_url, init) => {
    if (typeof init.body === 'string') published.push(JSON.parse(init.body));
    return new Response(null, { status: statuses.shift() ?? 200 });
  });
  return { published, fetchFn };
}

function pdfConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    ...buildMonitorConfig(
      { path: tmpDir, topic: 'reports', extensions: '.pdf', includeDirectories: false, recursive: false },
      {},
    ),
    ...overrides,
  };
}

describe('startMonitor', () => {
  it('announces the start before watching and logs the setup', async () => {
    const relay = createRelay();
    const source = new MemoryEventSource();
    const { logger, lines } = captureLogger('info');

    await startMonitor(pdfConfig(), { logger, source, fetchFn: relay.fetchFn });

    expect(source.started).toBe(true);
    expect(relay.published).toEqual([
      {
        topic: 'reports',
        message: 'Started monitoring folder for changes',
        title: 'Folder Monitoring Started',
        priority: 3,
        tags: ['rocket'],
      },
    ]);
    expect(lines).toEqual([
      `${FIXED_STAMP} - INFO - Started monitoring. Notifications will be sent to topic: reports`,
      `${FIXED_STAMP} - INFO - Monitoring only these extensions: .pdf`,
      `${FIXED_STAMP} - INFO - Monitoring folder: ${path.resolve(tmpDir)} (recursive: false)`,
    ]);
  });

  it('turns a created pdf into exactly one notification', async () => {
    const relay = createRelay();
    const source = new MemoryEventSource();
    const { logger } = captureLogger();
    await startMonitor(pdfConfig(), { logger, source, fetchFn: relay.fetchFn, now: () => FIXED_NOW });
    relay.published.length = 0;

    const filePath = path.join(tmpDir, 'report.pdf');
    await source.emit({ kind: 'created', path: filePath, isDirectory: false });

    expect(relay.published).toHaveLength(1);
    const [payload] = relay.published;
    expect(payload.topic).toBe('reports');
    expect(payload.title).toBe('File Created');
    expect(payload.priority).toBe(3);
    expect(payload.tags).toEqual(['file_folder,new']);
    expect(payload.message).toBe(
      `File created: report.pdf\nLocation: ${filePath}\nSize: 2.00 KB\nTime: ${FIXED_STAMP}`,
    );
  });

  it('drops events the filter rejects', async () => {
    const relay = createRelay();
    const source = new MemoryEventSource();
    const { logger } = captureLogger();
    await startMonitor(pdfConfig(), { logger, source, fetchFn: relay.fetchFn });

    await source.emit({ kind: 'created', path: path.join(tmpDir, 'notes.md'), isDirectory: false });
    await source.emit({ kind: 'created', path: path.join(tmpDir, 'sub'), isDirectory: true });

    expect(relay.fetchFn).toHaveBeenCalledTimes(1);
  });

  it('keeps processing after a failed delivery', async () => {
    const relay = createRelay([200, 500]);
    const source = new MemoryEventSource();
    const { logger, lines } = captureLogger();
    await startMonitor(pdfConfig(), { logger, source, fetchFn: relay.fetchFn });

    await expect(
      source.emit({ kind: 'deleted', path: '/gone/a.pdf', isDirectory: false }),
    ).resolves.toBeUndefined();
    await source.emit({ kind: 'deleted', path: '/gone/b.pdf', isDirectory: false });

    expect(lines).toContain(`${FIXED_STAMP} - ERROR - Failed to send notification: 500`);
    expect(relay.published.map((p) => p.message.split('\n')[0])).toEqual([
      'Started monitoring folder for changes',
      'File deleted: a.pdf',
      'File deleted: b.pdf',
    ]);
  });

  it('keeps processing after a transport failure', async () => {
    const source = new MemoryEventSource();
    const { logger, lines } = captureLogger();
    let calls = 0;
    const fetchFn = vi.fn<FetchFn>(async () => {
      calls++;
      if (calls === 2) throw new Error('getaddrinfo ENOTFOUND ntfy.sh');
      return new Response(null, { status: 200 });
    });
    await startMonitor(pdfConfig(), { logger, source, fetchFn });

    await source.emit({ kind: 'deleted', path: '/gone/a.pdf', isDirectory: false });
    await source.emit({ kind: 'deleted', path: '/gone/b.pdf', isDirectory: false });

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(lines).toContain(`${FIXED_STAMP} - ERROR - Error sending notification: getaddrinfo ENOTFOUND ntfy.sh`);
  });

  it('refuses to start when the path does not exist', async () => {
    const relay = createRelay();
    const source = new MemoryEventSource();
    const { logger, lines } = captureLogger();
    const missing = path.join(tmpDir, 'missing');

    await expect(
      startMonitor(pdfConfig({ path: missing }), { logger, source, fetchFn: relay.fetchFn }),
    ).rejects.toBeInstanceOf(ConfigurationError);

    expect(source.started).toBe(false);
    expect(relay.fetchFn).not.toHaveBeenCalled();
    expect(lines).toEqual([
      `${FIXED_STAMP} - ERROR - The specified path does not exist: ${missing} Pass an existing directory with --path.`,
    ]);
  });

  it('stop sends the final notification, then stops the source, once', async () => {
    const relay = createRelay();
    const source = new MemoryEventSource();
    const { logger, lines } = captureLogger();
    const monitor = await startMonitor(pdfConfig(), { logger, source, fetchFn: relay.fetchFn });

    await Promise.all([monitor.stop(), monitor.stop()]);

    expect(source.stopped).toBe(true);
    expect(source.listeners.size).toBe(0);
    expect(relay.published.map((p) => p.title)).toEqual(['Folder Monitoring Started', 'Monitoring Stopped']);
    expect(relay.published[1].tags).toEqual(['stop_sign']);
    expect(lines.filter((line) => line.endsWith('INFO - Monitoring stopped by user'))).toHaveLength(1);
  });
});
