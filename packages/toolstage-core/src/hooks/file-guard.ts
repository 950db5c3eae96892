import path from 'path';
import type { HookConfig } from '../types/index.js';
import { ALLOW, type HookDecision, type HookEvent } from './types.js';

const PATH_FIELDS = ['file_path', 'path', 'notebook_path'] as const;

/**
 * Target paths of a write/edit tool call.
 */
export function extractTargetPaths(event: HookEvent): string[] {
    const input = event.tool_input ?? {};
    const targets: string[] = [];
    for (const field of PATH_FIELDS) {
        const value = input[field];
        if (typeof value === 'string' && value.length > 0) {
            targets.push(value);
        }
    }
    return targets;
}

function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

function matchesProtected(target: string, cwd: string | undefined, protectedFiles: Set<string>): boolean {
    if (protectedFiles.has(path.basename(target))) {
        return true;
    }
    const relative = cwd && path.isAbsolute(target)
        ? path.relative(cwd, target)
        : path.normalize(target);
    return protectedFiles.has(toPosix(relative));
}

/**
 * Block writes to protected file names.
 */
export function checkProtectedFile(event: HookEvent, config: HookConfig): HookDecision {
    const guard = config.file_guard;
    if (!guard.enabled || guard.protected_files.length === 0) {
        return ALLOW;
    }

    const protectedFiles = new Set(guard.protected_files.map(file => path.posix.normalize(file)));
    for (const target of extractTargetPaths(event)) {
        if (matchesProtected(target, event.cwd, protectedFiles)) {
            return {
                decision: 'block',
                reason: `Blocked: '${target}' is a protected file and must not be modified by the assistant.`,
            };
        }
    }
    return ALLOW;
}
