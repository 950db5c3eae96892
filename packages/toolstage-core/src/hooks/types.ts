/**
 * Hook event and decision types.
 *
 * Events arrive as JSON on stdin from the assistant host. Only the
 * fields the hooks read are modelled; the rest pass through.
 */

import { z } from 'zod';

export const HOOK_EVENT_NAMES = [
    'PreToolUse',
    'PostToolUse',
    'Stop',
    'SubagentStop',
    'Notification',
] as const;

export type HookEventName = typeof HOOK_EVENT_NAMES[number];

export const HookEventSchema = z.object({
    hook_event_name: z.enum(HOOK_EVENT_NAMES),
    session_id: z.string().optional(),
    cwd: z.string().optional(),
    tool_name: z.string().optional(),
    tool_input: z.record(z.unknown()).optional(),
    message: z.string().optional(),
}).passthrough();

export type HookEvent = z.infer<typeof HookEventSchema>;

export type HookDecision =
    | { decision: 'allow' }
    | { decision: 'block'; reason: string };

export const HOOK_NAMES = ['file-guard', 'command-guard', 'notify'] as const;

export type HookName = typeof HOOK_NAMES[number];

export type NotificationAction =
    | { kind: 'ntfy'; url: string; title: string; message: string }
    | { kind: 'sound'; player: string; file: string };

export interface NotificationReport {
    action: NotificationAction;
    ok: boolean;
    error?: string;
}

export interface NotificationTransport {
    post(url: string, body: string, headers: Record<string, string>): Promise<void>;
    play(player: string, file: string): Promise<void>;
}

export interface HookOutcome {
    hook: HookName;
    exitCode: number;
    /** Fed back to the assistant when the action is blocked */
    stderr?: string;
    decision?: HookDecision;
    notifications?: NotificationReport[];
}

export const ALLOW: HookDecision = { decision: 'allow' };
