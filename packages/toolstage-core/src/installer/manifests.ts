import type { ToolManifest } from './types.js';

const WEB_EXPLORER: ToolManifest = {
    name: 'web_explorer',
    description: 'Browser automation scripts, MCP server wiring and justfile recipes',
    assets: [
        { source: 'root_scripts', destination: 'scripts', kind: 'directory', executable: '*.sh' },
        { source: 'root_dot_gitignore', destination: '.gitignore', kind: 'file' },
        { source: 'root_dot_mcp_dot_json', destination: '.mcp.json', kind: 'file' },
        { source: 'root_example_dot_env', destination: 'example.env', kind: 'file' },
        { source: 'root_justfile', destination: 'justfile', kind: 'file' },
    ],
};

export const TOOL_MANIFESTS: Readonly<Record<string, ToolManifest>> = {
    [WEB_EXPLORER.name]: WEB_EXPLORER,
};

export function getToolManifest(name: string): ToolManifest | undefined {
    return Object.prototype.hasOwnProperty.call(TOOL_MANIFESTS, name) ? TOOL_MANIFESTS[name] : undefined;
}
