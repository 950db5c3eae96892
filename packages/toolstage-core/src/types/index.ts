import { z } from 'zod';

export const DEFAULT_STAGING_ROOT = '.strategic-claude-basic/tools';
export const DEFAULT_TOOL = 'web_explorer';

export const StagingSchema = z.object({
    root: z.string().optional().default(DEFAULT_STAGING_ROOT),
    default_tool: z.string().optional().default(DEFAULT_TOOL),
});

export const BlockedFlagSchema = z.object({
    command: z.string().min(1),
    flag: z.string().min(1),
    reason: z.string().optional(),
});

export const FileGuardSchema = z.object({
    enabled: z.boolean().optional().default(true),
    protected_files: z.array(z.string()).optional().default([
        '.env',
        '.env.local',
        '.mcp.json',
        'package-lock.json',
    ]),
});

export const CommandGuardSchema = z.object({
    enabled: z.boolean().optional().default(true),
    blocked_flags: z.array(BlockedFlagSchema).optional().default([
        { command: 'git', flag: '--no-verify', reason: 'Commit hooks must run; fix the failing check instead.' },
        { command: 'git', flag: '--force', reason: 'Force pushes rewrite shared history.' },
    ]),
});

export const NotifySchema = z.object({
    enabled: z.boolean().optional().default(true),
    title: z.string().optional().default('Assistant'),
    ntfy: z.object({
        enabled: z.boolean().optional().default(false),
        server_url: z.string().url().optional().default('https://ntfy.sh'),
        topic: z.string().optional().default(''),
    }).optional().default({}),
    sound: z.object({
        enabled: z.boolean().optional().default(false),
        file: z.string().optional().default('notification.mp3'),
        player: z.string().optional().default('afplay'),
    }).optional().default({}),
});

export const HookConfigSchema = z.object({
    file_guard: FileGuardSchema.optional().default({}),
    command_guard: CommandGuardSchema.optional().default({}),
    notify: NotifySchema.optional().default({}),
});

export const ConfigSchema = z.object({
    version: z.number().default(1),
    staging: StagingSchema.optional().default({}),
    hooks: HookConfigSchema.optional().default({}),
});

export type BlockedFlag = z.infer<typeof BlockedFlagSchema>;
export type FileGuardConfig = z.infer<typeof FileGuardSchema>;
export type CommandGuardConfig = z.infer<typeof CommandGuardSchema>;
export type NotifyConfig = z.infer<typeof NotifySchema>;
export type HookConfig = z.infer<typeof HookConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

// Exit codes shared by the CLI and the hook runner
export const EXIT_OK = 0;
export const EXIT_FAIL = 1;
export const EXIT_BLOCK = 2;
export const EXIT_CONFIG_ERROR = 2;
