import { describe, it, expect } from 'vitest';
import { generateHookSettings, isOwnEntry, mergeHookSettings } from './templates.js';

describe('generateHookSettings', () => {
    it('wires guards before tool use and notify on stop', () => {
        expect(generateHookSettings()).toEqual({
            PreToolUse: [
                {
                    matcher: 'Write|Edit|MultiEdit|NotebookEdit',
                    hooks: [{ type: 'command', command: 'toolstage hooks run file-guard' }],
                },
                {
                    matcher: 'Bash',
                    hooks: [{ type: 'command', command: 'toolstage hooks run command-guard' }],
                },
            ],
            Stop: [
                { hooks: [{ type: 'command', command: 'toolstage hooks run notify' }] },
            ],
        });
    });

    it('uses the given base command', () => {
        const settings = generateHookSettings('npx toolstage');
        expect(settings.Stop[0].hooks[0].command).toBe('npx toolstage hooks run notify');
    });
});

function eventEntries(settings: Record<string, unknown>, event: string): unknown[] {
    const hooks = settings.hooks;
    if (typeof hooks !== 'object' || hooks === null || !(event in hooks)) {
        return [];
    }
    const entries: unknown = Object.getOwnPropertyDescriptor(hooks, event)?.value;
    return Array.isArray(entries) ? entries : [];
}

describe('isOwnEntry', () => {
    it('recognises generated entries under any command prefix', () => {
        for (const command of ['toolstage hooks run notify', 'npx toolstage hooks run file-guard', '/opt/bin/toolstage hooks run command-guard']) {
            expect(isOwnEntry({ hooks: [{ type: 'command', command }] })).toBe(true);
        }
    });

    it('ignores foreign and malformed entries', () => {
        expect(isOwnEntry({ hooks: [{ type: 'command', command: 'prettier --write' }] })).toBe(false);
        expect(isOwnEntry({ hooks: [{ type: 'prompt', prompt: 'Summarize the session' }] })).toBe(false);
        expect(isOwnEntry({ hooks: [{ type: 'command', command: 'toolstage hooks run lint' }] })).toBe(false);
        expect(isOwnEntry('toolstage hooks run notify')).toBe(false);
        expect(isOwnEntry(null)).toBe(false);
    });
});

describe('mergeHookSettings', () => {
    it('keeps foreign settings and hooks, replacing earlier generated entries', () => {
        const existing = {
            permissions: { allow: ['Bash(npm test)'] },
            hooks: {
                PostToolUse: [{ matcher: 'Write', hooks: [{ type: 'command', command: 'prettier --write' }] }],
                Stop: [
                    { hooks: [{ type: 'command', command: 'say done' }] },
                    { hooks: [{ type: 'command', command: 'toolstage hooks run notify' }] },
                ],
            },
        };

        const merged = mergeHookSettings(existing, generateHookSettings());

        expect(merged.permissions).toEqual({ allow: ['Bash(npm test)'] });
        expect(merged.hooks).toMatchObject({
            PostToolUse: [{ matcher: 'Write', hooks: [{ type: 'command', command: 'prettier --write' }] }],
            Stop: [
                { hooks: [{ type: 'command', command: 'say done' }] },
                { hooks: [{ type: 'command', command: 'toolstage hooks run notify' }] },
            ],
        });
        expect(eventEntries(merged, 'PreToolUse')).toHaveLength(2);
    });

    it('keeps other events and entries that are not command hooks', () => {
        const promptHook = { hooks: [{ type: 'prompt', prompt: 'Check the task list is done' }] };
        const existing = {
            hooks: {
                PostToolUse: [{ matcher: 'Write', hooks: [{ type: 'command', command: 'prettier --write' }] }],
                Stop: [promptHook],
                Custom: 'left alone',
            },
        };

        const merged = mergeHookSettings(existing, generateHookSettings());

        expect(merged.hooks).toHaveProperty('PostToolUse', existing.hooks.PostToolUse);
        expect(merged.hooks).toHaveProperty('Custom', 'left alone');
        expect(eventEntries(merged, 'Stop')).toEqual([
            promptHook,
            { hooks: [{ type: 'command', command: 'toolstage hooks run notify' }] },
        ]);
    });

    it('replaces entries written with another command prefix', () => {
        const first = mergeHookSettings({}, generateHookSettings('toolstage'));

        const second = mergeHookSettings(first, generateHookSettings('npx toolstage'));

        expect(eventEntries(second, 'PreToolUse')).toEqual(generateHookSettings('npx toolstage').PreToolUse);
        expect(eventEntries(second, 'Stop')).toHaveLength(1);
    });

    it('replaces a malformed hooks value', () => {
        const merged = mergeHookSettings({ hooks: 'broken' }, generateHookSettings());
        expect(merged.hooks).toEqual(generateHookSettings());
    });
});
