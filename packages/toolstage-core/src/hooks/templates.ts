/**
 * Host settings that wire the hooks into the assistant.
 *
 * Produces the `hooks` block of .claude/settings.json:
 * - PreToolUse (Write|Edit|MultiEdit|NotebookEdit) -> file guard
 * - PreToolUse (Bash)                              -> command guard
 * - Stop                                           -> notify
 */

import { HOOK_NAMES, type HookName } from './types.js';

export const SETTINGS_PATH = '.claude/settings.json';
export const WRITE_TOOL_MATCHER = 'Write|Edit|MultiEdit|NotebookEdit';
export const SHELL_TOOL_MATCHER = 'Bash';

export interface HookCommandEntry {
    type: 'command';
    command: string;
}

export interface HookMatcherEntry {
    matcher?: string;
    hooks: HookCommandEntry[];
}

export type HookSettings = Record<string, HookMatcherEntry[]>;

function entry(baseCommand: string, hook: HookName, matcher?: string): HookMatcherEntry {
    const hooks: HookCommandEntry[] = [{ type: 'command', command: `${baseCommand} hooks run ${hook}` }];
    return matcher ? { matcher, hooks } : { hooks };
}

/**
 * Hook settings for the given CLI invocation (e.g. `npx toolstage`).
 */
export function generateHookSettings(baseCommand = 'toolstage'): HookSettings {
    return {
        PreToolUse: [
            entry(baseCommand, 'file-guard', WRITE_TOOL_MATCHER),
            entry(baseCommand, 'command-guard', SHELL_TOOL_MATCHER),
        ],
        Stop: [
            entry(baseCommand, 'notify'),
        ],
    };
}

const OWN_COMMAND = new RegExp(`(^|\\s)hooks run (${HOOK_NAMES.join('|')})\\s*$`);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True for an entry generated by any toolstage invocation
 * (`toolstage`, `npx toolstage`, a custom `--command`).
 */
export function isOwnEntry(candidate: unknown): boolean {
    if (!isRecord(candidate) || !Array.isArray(candidate.hooks)) {
        return false;
    }
    return candidate.hooks.some((h: unknown) =>
        isRecord(h) && typeof h.command === 'string' && OWN_COMMAND.test(h.command));
}

/**
 * Merge generated hooks into existing settings, replacing previously
 * generated entries. Events not generated here, and entries of any shape
 * not produced by toolstage, are kept as they are.
 */
export function mergeHookSettings(
    existing: Record<string, unknown>,
    generated: HookSettings,
): Record<string, unknown> {
    const current = isRecord(existing.hooks) ? existing.hooks : {};
    const hooks: Record<string, unknown> = { ...current };
    for (const [event, entries] of Object.entries(generated)) {
        const previous = current[event];
        const kept = Array.isArray(previous) ? previous.filter(e => !isOwnEntry(e)) : [];
        hooks[event] = [...kept, ...entries];
    }
    return { ...existing, hooks };
}
