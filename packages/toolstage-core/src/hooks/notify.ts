/**
 * Session notifications: a push message to an ntfy server and/or a
 * local sound. Planning is pure; dispatch goes through a transport so
 * the side effects stay at the edge.
 */

import path from 'path';
import { execa } from 'execa';
import type { HookConfig } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import type {
    HookEvent,
    NotificationAction,
    NotificationReport,
    NotificationTransport,
} from './types.js';

const NOTIFY_EVENTS = new Set(['Stop', 'SubagentStop', 'Notification']);
const POST_TIMEOUT_MS = 5000;

function projectName(event: HookEvent): string {
    return event.cwd ? path.basename(event.cwd) : 'project';
}

export function notificationMessage(event: HookEvent): string {
    if (event.message) {
        return event.message;
    }
    if (event.hook_event_name === 'SubagentStop') {
        return `Subagent finished in ${projectName(event)}`;
    }
    return `Session finished in ${projectName(event)}`;
}

export function ntfyUrl(serverUrl: string, topic: string): string {
    return `${serverUrl.replace(/\/+$/, '')}/${encodeURIComponent(topic)}`;
}

/**
 * Actions to perform for an event, in dispatch order.
 */
export function planNotifications(event: HookEvent, config: HookConfig): NotificationAction[] {
    const notify = config.notify;
    if (!notify.enabled || !NOTIFY_EVENTS.has(event.hook_event_name)) {
        return [];
    }

    const actions: NotificationAction[] = [];
    const topic = notify.ntfy.topic.trim();
    if (notify.ntfy.enabled && topic.length > 0) {
        actions.push({
            kind: 'ntfy',
            url: ntfyUrl(notify.ntfy.server_url, topic),
            title: notify.title,
            message: notificationMessage(event),
        });
    }
    if (notify.sound.enabled) {
        actions.push({ kind: 'sound', player: notify.sound.player, file: notify.sound.file });
    }
    return actions;
}

export const defaultTransport: NotificationTransport = {
    async post(url, body, headers) {
        const response = await fetch(url, {
            method: 'POST',
            body,
            headers,
            signal: AbortSignal.timeout(POST_TIMEOUT_MS),
        });
        if (!response.ok) {
            throw new Error(`ntfy responded ${response.status} ${response.statusText}`);
        }
    },
    async play(player, file) {
        await execa(player, [file], { timeout: POST_TIMEOUT_MS, stdio: 'ignore' });
    },
};

async function perform(action: NotificationAction, transport: NotificationTransport): Promise<void> {
    switch (action.kind) {
        case 'ntfy':
            await transport.post(action.url, action.message, {
                'Title': action.title,
                'Content-Type': 'text/plain; charset=utf-8',
            });
            return;
        case 'sound':
            await transport.play(action.player, action.file);
            return;
    }
}

/**
 * Run every action; a failure is logged and reported, never thrown.
 */
export async function dispatchNotifications(
    actions: NotificationAction[],
    transport: NotificationTransport = defaultTransport,
): Promise<NotificationReport[]> {
    const reports: NotificationReport[] = [];
    for (const action of actions) {
        try {
            await perform(action, transport);
            reports.push({ action, ok: true });
        } catch (error) {
            const message = errorMessage(error);
            Logger.warn(`Notification (${action.kind}) failed: ${message}`);
            reports.push({ action, ok: false, error: message });
        }
    }
    return reports;
}
