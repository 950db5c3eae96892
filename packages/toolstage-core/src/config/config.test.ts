import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import yaml from 'yaml';
import { DEFAULT_CONFIG_YAML, loadConfig, parseConfig } from './index.js';
import { ConfigError } from '../errors.js';
import { ConfigSchema } from '../types/index.js';

describe('loadConfig', () => {
    let testDir: string;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('returns defaults when toolstage.yml is missing', async () => {
        const config = await loadConfig(testDir);

        expect(config.staging).toEqual({ root: '.strategic-claude-basic/tools', default_tool: 'web_explorer' });
        expect(config.hooks.file_guard.enabled).toBe(true);
        expect(config.hooks.notify.ntfy.enabled).toBe(false);
    });

    it('merges file values over defaults', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), yaml.stringify({
            version: 1,
            hooks: { notify: { ntfy: { enabled: true, topic: 'builds' } } },
        }));

        const config = await loadConfig(testDir);

        expect(config.hooks.notify.ntfy).toEqual({ enabled: true, server_url: 'https://ntfy.sh', topic: 'builds' });
        expect(config.hooks.notify.sound.enabled).toBe(false);
    });

    it('treats an empty file as defaults', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), '');
        expect(await loadConfig(testDir)).toEqual(ConfigSchema.parse({}));
    });

    it('rejects schema violations with the offending path', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), 'hooks:\n  file_guard:\n    enabled: "yes"\n');

        await expect(loadConfig(testDir)).rejects.toThrow(/hooks\.file_guard\.enabled: Expected boolean, received string/);
    });
});

describe('parseConfig', () => {
    it('rejects malformed YAML', () => {
        expect(() => parseConfig('hooks: [unclosed', 'x.yml')).toThrow(ConfigError);
    });

    it('parses the default config template to the schema defaults', () => {
        expect(parseConfig(DEFAULT_CONFIG_YAML)).toEqual(ConfigSchema.parse({}));
    });
});
