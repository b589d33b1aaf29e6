import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadConfig, resetConfig } from '../config.js';

const { describe, it, beforeEach, afterEach } = test;

describe('loadConfig', () => {
  let tempDir: string;
  let configDir: string;
  const savedEnv = process.env.ENTITY_LINKS_CONFIG;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'entity-links-config-'));
    configDir = path.join(tempDir, 'config');
    fs.mkdirSync(configDir);
    process.env.ENTITY_LINKS_CONFIG = 'test';
    resetConfig();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    if (savedEnv === undefined) {
      delete process.env.ENTITY_LINKS_CONFIG;
    } else {
      process.env.ENTITY_LINKS_CONFIG = savedEnv;
    }
    resetConfig();
  });

  it('should read the file named by the environment', async () => {
    fs.writeFileSync(path.join(configDir, 'config.test.json'), JSON.stringify({
      port: 4100,
      seedFile: 'data/seed.json'
    }));

    const config = await loadConfig(configDir);

    assert.deepStrictEqual(config, {
      port: 4100,
      defaultListLimit: 50,
      seedFile: path.join(tempDir, 'data', 'seed.json')
    });
  });

  it('should ignore values of the wrong type', async () => {
    fs.writeFileSync(path.join(configDir, 'config.test.json'), JSON.stringify({
      port: '4100',
      defaultListLimit: 10
    }));

    const config = await loadConfig(configDir);

    assert.deepStrictEqual(config, { port: 3000, defaultListLimit: 10 });
  });

  it('should fall back to defaults without a file', async () => {
    const config = await loadConfig(configDir);
    assert.deepStrictEqual(config, { port: 3000, defaultListLimit: 50 });
  });

  it('should cache until reset', async () => {
    const first = await loadConfig(configDir);
    fs.writeFileSync(path.join(configDir, 'config.test.json'), JSON.stringify({ port: 4200 }));

    assert.strictEqual(await loadConfig(configDir), first);

    resetConfig();
    assert.strictEqual((await loadConfig(configDir)).port, 4200);
  });
});
