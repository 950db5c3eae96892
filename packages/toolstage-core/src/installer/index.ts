export {
    installTool,
    planInstall,
    listStagedTools,
    listKnownTools,
    resolveStagingRoot,
    describeAsset,
} from './installer.js';
export { TOOL_MANIFESTS, getToolManifest } from './manifests.js';
export {
    ARCHIVE_TOOLS,
    SETUP_MARKER,
    getArchiveTool,
    checkRequirement,
    checkRequirements,
    sha256File,
    verifyArchive,
    ensureArchive,
    extractArchive,
    runArchiveSetup,
    setupArchiveTool,
} from './archive.js';
export type {
    AssetKind,
    StagedAsset,
    ToolManifest,
    PlannedStep,
    InstalledStep,
    InstallResult,
    InstallOptions,
    Requirement,
    RequirementCheck,
    ArchiveTool,
    CommandRunner,
    ArchiveSetupOptions,
    ArchiveSetupResult,
} from './types.js';
