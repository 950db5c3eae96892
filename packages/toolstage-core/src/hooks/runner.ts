/**
 * Hook entry point shared by the CLI and tests.
 *
 * Exit codes follow the host convention:
 *   0 = allow
 *   1 = hook error (non-blocking for the host)
 *   2 = block, stderr is returned to the assistant
 */

import { EXIT_BLOCK, EXIT_FAIL, EXIT_OK, type HookConfig } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { checkProtectedFile } from './file-guard.js';
import { checkBlockedFlags } from './command-guard.js';
import { dispatchNotifications, planNotifications } from './notify.js';
import {
    HOOK_NAMES,
    HookEventSchema,
    type HookDecision,
    type HookEvent,
    type HookName,
    type HookOutcome,
    type NotificationTransport,
} from './types.js';

export function isHookName(name: string): name is HookName {
    return HOOK_NAMES.some(hook => hook === name);
}

/**
 * Parse a raw stdin payload into a hook event.
 */
export function parseHookEvent(raw: string): HookEvent {
    const trimmed = raw.trim();
    if (!trimmed) {
        throw new Error('Empty hook input');
    }
    let payload: unknown;
    try {
        payload = JSON.parse(trimmed);
    } catch (error) {
        throw new Error(`Hook input is not JSON: ${errorMessage(error)}`);
    }
    const parsed = HookEventSchema.safeParse(payload);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new Error(`Unrecognized hook event: ${issues}`);
    }
    return parsed.data;
}

function decisionOutcome(hook: HookName, decision: HookDecision): HookOutcome {
    if (decision.decision === 'block') {
        return { hook, exitCode: EXIT_BLOCK, stderr: decision.reason, decision };
    }
    return { hook, exitCode: EXIT_OK, decision };
}

/**
 * Evaluate a parsed event with the named hook.
 */
export async function evaluateHook(
    hook: HookName,
    event: HookEvent,
    config: HookConfig,
    transport?: NotificationTransport,
): Promise<HookOutcome> {
    switch (hook) {
        case 'file-guard':
            return decisionOutcome(hook, checkProtectedFile(event, config));
        case 'command-guard':
            return decisionOutcome(hook, checkBlockedFlags(event, config));
        case 'notify': {
            const notifications = await dispatchNotifications(planNotifications(event, config), transport);
            return { hook, exitCode: EXIT_OK, notifications };
        }
    }
}

/**
 * Parse the raw stdin payload and run the named hook on it.
 */
export async function runHook(
    hook: HookName,
    rawInput: string,
    config: HookConfig,
    transport?: NotificationTransport,
): Promise<HookOutcome> {
    let event: HookEvent;
    try {
        event = parseHookEvent(rawInput);
    } catch (error) {
        return { hook, exitCode: EXIT_FAIL, stderr: `toolstage hook error: ${errorMessage(error)}` };
    }
    return evaluateHook(hook, event, config, transport);
}
