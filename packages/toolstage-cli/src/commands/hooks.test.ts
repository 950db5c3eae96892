/**
 * Tests for hooks init and hooks run.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { NotificationTransport } from '@toolstage/core';
import { hooksInitCommand, hooksRunCommand, resolveHookCommand } from './hooks.js';

describe('hooksInitCommand', () => {
    let testDir: string;
    let originalExitCode: typeof process.exitCode;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hooks-init-test-'));
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });
        originalExitCode = process.exitCode;
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
        process.exitCode = originalExitCode;
        vi.restoreAllMocks();
    });

    function readSettings() {
        return JSON.parse(fs.readFileSync(path.join(testDir, '.claude', 'settings.json'), 'utf-8'));
    }

    it('creates .claude/settings.json with the three hooks', async () => {
        await hooksInitCommand(testDir);

        const settings = readSettings();
        expect(settings.hooks.PreToolUse[0].matcher).toBe('Write|Edit|MultiEdit|NotebookEdit');
        expect(settings.hooks.PreToolUse[0].hooks[0].command).toBe('toolstage hooks run file-guard');
        expect(settings.hooks.PreToolUse[1].hooks[0].command).toBe('toolstage hooks run command-guard');
        expect(settings.hooks.Stop[0].hooks[0].command).toBe('toolstage hooks run notify');
    });

    it('merges into existing settings and stays idempotent', async () => {
        fs.mkdirSync(path.join(testDir, '.claude'));
        fs.writeFileSync(path.join(testDir, '.claude', 'settings.json'), JSON.stringify({
            model: 'sonnet',
            hooks: { Stop: [{ hooks: [{ type: 'command', command: 'say done' }] }] },
        }));

        await hooksInitCommand(testDir);
        await hooksInitCommand(testDir);

        const settings = readSettings();
        expect(settings.model).toBe('sonnet');
        expect(settings.hooks.Stop.map((e: { hooks: Array<{ command: string }> }) => e.hooks[0].command))
            .toEqual(['say done', 'toolstage hooks run notify']);
        expect(settings.hooks.PreToolUse).toHaveLength(2);
    });

    it('does not duplicate guards after switching to a local install', async () => {
        await hooksInitCommand(testDir);
        fs.mkdirSync(path.join(testDir, 'node_modules', '.bin'), { recursive: true });
        fs.writeFileSync(path.join(testDir, 'node_modules', '.bin', 'toolstage'), '');

        await hooksInitCommand(testDir);

        const settings = readSettings();
        expect(settings.hooks.PreToolUse.map((e: { hooks: Array<{ command: string }> }) => e.hooks[0].command))
            .toEqual(['npx toolstage hooks run file-guard', 'npx toolstage hooks run command-guard']);
        expect(settings.hooks.Stop).toHaveLength(1);
    });

    it('replaces the file with --force', async () => {
        fs.mkdirSync(path.join(testDir, '.claude'));
        fs.writeFileSync(path.join(testDir, '.claude', 'settings.json'), '{"model":"sonnet"}');

        await hooksInitCommand(testDir, { force: true });

        expect(readSettings().model).toBeUndefined();
    });

    it('writes nothing in dry-run mode', async () => {
        await hooksInitCommand(testDir, { dryRun: true });

        expect(fs.existsSync(path.join(testDir, '.claude', 'settings.json'))).toBe(false);
    });

    it('refuses to overwrite malformed settings', async () => {
        fs.mkdirSync(path.join(testDir, '.claude'));
        fs.writeFileSync(path.join(testDir, '.claude', 'settings.json'), '{ nope');

        await hooksInitCommand(testDir);

        expect(process.exitCode).toBe(1);
        expect(fs.readFileSync(path.join(testDir, '.claude', 'settings.json'), 'utf-8')).toBe('{ nope');
    });

    it('uses npx when the binary is installed locally', () => {
        expect(resolveHookCommand(testDir)).toBe('toolstage');
        fs.mkdirSync(path.join(testDir, 'node_modules', '.bin'), { recursive: true });
        fs.writeFileSync(path.join(testDir, 'node_modules', '.bin', 'toolstage'), '');
        expect(resolveHookCommand(testDir)).toBe('npx toolstage');
    });
});

describe('hooksRunCommand', () => {
    let testDir: string;
    let originalExitCode: typeof process.exitCode;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hooks-run-test-'));
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        originalExitCode = process.exitCode;
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
        process.exitCode = originalExitCode;
        vi.restoreAllMocks();
    });

    function stderr(): string {
        return vi.mocked(process.stderr.write).mock.calls.map(call => String(call[0])).join('');
    }

    it('blocks a protected write with exit code 2', async () => {
        const input = JSON.stringify({
            hook_event_name: 'PreToolUse',
            cwd: testDir,
            tool_name: 'Write',
            tool_input: { file_path: path.join(testDir, '.env') },
        });

        await hooksRunCommand(testDir, 'file-guard', { input });

        expect(process.exitCode).toBe(2);
        expect(stderr()).toBe(`Blocked: '${path.join(testDir, '.env')}' is a protected file and must not be modified by the assistant.\n`);
    });

    it('loads the config from the event cwd', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), 'hooks:\n  command_guard:\n    enabled: false\n');
        const input = JSON.stringify({
            hook_event_name: 'PreToolUse',
            cwd: testDir,
            tool_name: 'Bash',
            tool_input: { command: 'git push --force' },
        });

        const outcome = await hooksRunCommand(os.tmpdir(), 'command-guard', { input });

        expect(outcome?.decision).toEqual({ decision: 'allow' });
        expect(process.exitCode).toBe(0);
    });

    it('notifies through the transport on stop', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), [
            'hooks:',
            '  notify:',
            '    ntfy:',
            '      enabled: true',
            '      topic: test-topic',
        ].join('\n'));
        const post = vi.fn<NotificationTransport['post']>().mockResolvedValue(undefined);
        const play = vi.fn<NotificationTransport['play']>().mockResolvedValue(undefined);

        await hooksRunCommand(testDir, 'notify', {
            input: JSON.stringify({ hook_event_name: 'Stop', cwd: testDir }),
            transport: { post, play },
        });

        expect(process.exitCode).toBe(0);
        expect(post).toHaveBeenCalledWith(
            'https://ntfy.sh/test-topic',
            `Session finished in ${path.basename(testDir)}`,
            { 'Title': 'Assistant', 'Content-Type': 'text/plain; charset=utf-8' },
        );
        expect(play).not.toHaveBeenCalled();
    });

    it('exits 1 for an unknown hook', async () => {
        await hooksRunCommand(testDir, 'lint', { input: '{}' });

        expect(process.exitCode).toBe(1);
        expect(stderr()).toBe("toolstage hook error: unknown hook 'lint'. Valid: file-guard, command-guard, notify\n");
    });

    it('exits 1 without blocking on an invalid config', async () => {
        fs.writeFileSync(path.join(testDir, 'toolstage.yml'), 'hooks: 5\n');

        await hooksRunCommand(testDir, 'file-guard', {
            input: JSON.stringify({ hook_event_name: 'PreToolUse', cwd: testDir, tool_name: 'Write' }),
        });

        expect(process.exitCode).toBe(1);
        expect(stderr()).toMatch(/^toolstage hook error: Invalid .*toolstage\.yml: hooks: Expected object, received number\n$/);
    });
});
