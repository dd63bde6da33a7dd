/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the engine and external
 * concerns (file system, version control, manifests, UI).
 */

export type { FileProvider, WalkEntry, WalkOptions } from './file-provider.js';
export type { VcsProvider } from './vcs-provider.js';
export type { ManifestProvider, ManifestData, ManifestFieldUpdate } from './manifest-provider.js';
export type { ChangesetCodec } from './changeset-codec.js';
export type { OutputPort } from './output.js';
export type { PromptPort, PromptChoice, TextPromptOptions } from './prompt.js';
export { NodeFileProvider } from './node-file-provider.js';
export { MemoryFileProvider } from './memory-file-provider.js';
export { GitVcsProvider, parseNameStatus } from './git-vcs-provider.js';
export { JsonManifestProvider } from './json-manifest-provider.js';
export { yamlChangesetCodec, jsonChangesetCodec, codecFor, CHANGESET_RECORD_FIELDS } from './changeset-codec.js';
export { consoleOutput } from './console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './console-prompt.js';
