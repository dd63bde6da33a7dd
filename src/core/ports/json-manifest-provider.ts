import { applyEdits, modify, parse, printParseErrorCode, type ParseError } from 'jsonc-parser';

import type { ManifestData, ManifestFieldUpdate, ManifestProvider } from './manifest-provider.js';
import { EDGE_KINDS, ErrorCodes, SECTION_BY_KIND, type EdgeKind } from '../../types/index.js';
import { WorkspaceError } from '../../utils/errors.js';
import { isRecord, isStringArray } from '../../utils/guards.js';

interface Indentation {
  insertSpaces: boolean;
  tabSize: number;
  eol: string;
}

function detectIndentation(text: string): Indentation {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const indented = text.split(/\r?\n/).find(line => /^[ \t]+\S/.test(line));
  if (!indented) {
    return { insertSpaces: true, tabSize: 2, eol };
  }
  if (indented.startsWith('\t')) {
    return { insertSpaces: false, tabSize: 1, eol };
  }
  const match = /^ +/.exec(indented);
  return { insertSpaces: true, tabSize: match ? match[0].length : 2, eol };
}

/**
 * package.json reader/writer built on jsonc-parser
 */
export class JsonManifestProvider implements ManifestProvider {
  readonly fileName = 'package.json';

  parse(text: string, path: string): ManifestData {
    const errors: ParseError[] = [];
    const parsed: unknown = parse(text, errors, { allowTrailingComma: true, disallowComments: false });
    const fail = (reason: string): WorkspaceError =>
      new WorkspaceError(`Malformed manifest ${path}: ${reason}`, ErrorCodes.MANIFEST_PARSE, { path });

    const firstError = errors[0];
    if (firstError) {
      throw fail(`${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`);
    }
    if (!isRecord(parsed)) {
      throw fail('expected a JSON object');
    }

    const { name, version } = parsed;
    if (name !== undefined && typeof name !== 'string') {
      throw fail('"name" must be a string');
    }
    if (version !== undefined && typeof version !== 'string') {
      throw fail('"version" must be a string');
    }

    const dependencies: Record<EdgeKind, Record<string, string>> = {
      runtime: {},
      development: {},
      peer: {},
      optional: {}
    };
    for (const kind of EDGE_KINDS) {
      const section = SECTION_BY_KIND[kind];
      const block = parsed[section];
      if (block === undefined) continue;
      if (!isRecord(block)) {
        throw fail(`"${section}" must be an object`);
      }
      for (const [dep, range] of Object.entries(block)) {
        if (typeof range !== 'string') {
          throw fail(`"${section}.${dep}" must be a string`);
        }
        dependencies[kind][dep] = range;
      }
    }

    let workspaces: string[] | undefined;
    const rawWorkspaces = parsed.workspaces;
    if (isStringArray(rawWorkspaces)) {
      workspaces = rawWorkspaces;
    } else if (isRecord(rawWorkspaces) && isStringArray(rawWorkspaces.packages)) {
      workspaces = rawWorkspaces.packages;
    } else if (rawWorkspaces !== undefined) {
      throw fail('"workspaces" must be a string array or { packages: string[] }');
    }

    return {
      name,
      version,
      private: parsed.private === true,
      workspaces,
      dependencies
    };
  }

  update(text: string, updates: ManifestFieldUpdate[]): string {
    const formattingOptions = detectIndentation(text);
    let result = text;
    for (const update of updates) {
      const edits = modify(result, update.path, update.value, { formattingOptions });
      result = applyEdits(result, edits);
    }
    return result;
  }
}
