import { afterEach, describe, expect, it, vi } from 'vitest';

import { Gateway } from '../src/application.js';
import type { GatewaySettings } from '../src/config/types.js';
import { ConfigError } from '../src/errors/app-error.js';

import { findFreePort, sendRequest, settingsFrom } from './helpers/http.js';

function redirectSettings(port: number, serverName: string | null, to: string) {
  const nameLine = serverName ? `    server_name: ${serverName}\n` : '';
  return settingsFrom(`
host:
  - port: ${port}
    ip: 127.0.0.1
${nameLine}    route:
      - location: /
        redirect_to: ${to}
`);
}

describe('Gateway', () => {
  let gateway: Gateway | undefined;

  afterEach(async () => {
    await gateway?.shutdown();
    gateway = undefined;
  });

  it('serves the loaded configuration and swaps it on reload', async () => {
    const port = await findFreePort();
    const load = vi
      .fn<(filePath: string) => Promise<GatewaySettings>>()
      .mockResolvedValueOnce(redirectSettings(port, null, 'https://v1.example/'))
      .mockResolvedValueOnce(
        redirectSettings(port, 'new.test', 'https://v2.example/')
      );
    gateway = new Gateway({
      configPath: '/etc/portico/config.yaml',
      watch: false,
      shutdownGraceMs: 1_000,
      load,
    });

    await gateway.start();
    expect(load).toHaveBeenCalledWith('/etc/portico/config.yaml');
    expect(gateway.addresses().map((entry) => entry.port)).toEqual([port]);

    const before = await sendRequest(port, {
      headers: { host: `anything.test:${port}` },
    });
    expect(before.status).toBe(301);
    expect(before.headers.location).toBe('https://v1.example/');

    await gateway.reload();

    const renamed = await sendRequest(port, {
      headers: { host: `new.test:${port}` },
    });
    expect(renamed.headers.location).toBe('https://v2.example/');

    const dropped = await sendRequest(port, {
      headers: { host: `anything.test:${port}` },
    });
    expect(dropped.status).toBe(400);
  });

  it('fails to start on an invalid configuration', async () => {
    gateway = new Gateway({
      configPath: '/etc/portico/config.yaml',
      watch: false,
      load: async () => {
        throw new ConfigError('upstream "api" has no servers');
      },
    });

    await expect(gateway.start()).rejects.toThrow(
      'upstream "api" has no servers'
    );
    expect(gateway.addresses()).toEqual([]);
  });

  it('stops listening on shutdown and ignores later swaps', async () => {
    const port = await findFreePort();
    const settings = redirectSettings(port, null, 'https://v1.example/');
    gateway = new Gateway({
      configPath: '/etc/portico/config.yaml',
      watch: false,
      shutdownGraceMs: 1_000,
      load: async () => settings,
    });
    await gateway.start();

    await gateway.shutdown();
    await gateway.applySettings(settings);

    expect(gateway.addresses()).toEqual([]);
    await expect(
      sendRequest(port, { headers: { host: `a.test:${port}` } })
    ).rejects.toThrow();
  });
});
