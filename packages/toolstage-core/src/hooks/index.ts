/**
 * Hooks module: guards and notifications invoked by the assistant host.
 */

export { checkProtectedFile, extractTargetPaths } from './file-guard.js';
export { checkBlockedFlags, findBlockedFlag, tokenizeCommand } from './command-guard.js';
export {
    planNotifications,
    dispatchNotifications,
    notificationMessage,
    ntfyUrl,
    defaultTransport,
} from './notify.js';
export { runHook, evaluateHook, parseHookEvent, isHookName } from './runner.js';
export {
    generateHookSettings,
    mergeHookSettings,
    isOwnEntry,
    SETTINGS_PATH,
    WRITE_TOOL_MATCHER,
    SHELL_TOOL_MATCHER,
} from './templates.js';
export type { HookSettings, HookMatcherEntry, HookCommandEntry } from './templates.js';
export { HookEventSchema, HOOK_NAMES, HOOK_EVENT_NAMES, ALLOW } from './types.js';
export type {
    HookEvent,
    HookEventName,
    HookDecision,
    HookName,
    HookOutcome,
    NotificationAction,
    NotificationReport,
    NotificationTransport,
} from './types.js';
