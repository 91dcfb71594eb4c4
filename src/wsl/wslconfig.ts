/**
 * @fileoverview `.wslconfig` rendering
 *
 * Minimal INI model that round-trips comments and unrelated sections, so
 * resource limits can be merged into an existing Windows-side file.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { hasErrorCode } from '../utils/errors.js';

export const WSL2_SECTION = 'wsl2';
export const WSLCONFIG_FILE = '.wslconfig';

// ============================================================================
// TYPES
// ============================================================================

export type IniLine =
  | { kind: 'entry'; key: string; value: string }
  | { kind: 'comment'; text: string }
  | { kind: 'blank' };

export interface IniSection {
  /** Null for lines before the first header */
  name: string | null;
  lines: IniLine[];
}

export interface IniDocument {
  sections: IniSection[];
}

export interface WslSettings {
  memory: string;
  processors: number;
  swap: string;
  localhostForwarding: boolean;
}

// ============================================================================
// PARSE / RENDER
// ============================================================================

export function parseIni(text: string): IniDocument {
  const sections: IniSection[] = [{ name: null, lines: [] }];
  let current = sections[0];

  const rows = text.split(/\r?\n/);
  if (rows[rows.length - 1] === '') rows.pop();

  for (const row of rows) {
    const line = row.trim();
    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      current = { name: header[1].trim(), lines: [] };
      sections.push(current);
    } else if (line === '') {
      current.lines.push({ kind: 'blank' });
    } else if (line.startsWith('#') || line.startsWith(';')) {
      current.lines.push({ kind: 'comment', text: line });
    } else {
      const eq = line.indexOf('=');
      if (eq === -1) {
        // Keys without a value are kept verbatim
        current.lines.push({ kind: 'comment', text: line });
      } else {
        current.lines.push({ kind: 'entry', key: line.slice(0, eq).trim(), value: line.slice(eq + 1).trim() });
      }
    }
  }

  if (sections[0].lines.length === 0) sections.shift();
  return { sections };
}

/** Serialize with CRLF line endings. */
export function renderIni(document: IniDocument): string {
  const out: string[] = [];
  for (const section of document.sections) {
    if (section.name !== null) out.push(`[${section.name}]`);
    for (const line of section.lines) {
      switch (line.kind) {
        case 'entry':
          out.push(`${line.key}=${line.value}`);
          break;
        case 'comment':
          out.push(line.text);
          break;
        case 'blank':
          out.push('');
          break;
      }
    }
  }
  return out.length > 0 ? `${out.join('\r\n')}\r\n` : '';
}

// ============================================================================
// MERGE
// ============================================================================

export function settingsToEntries(settings: WslSettings): Array<[string, string]> {
  return [
    ['memory', settings.memory],
    ['processors', String(settings.processors)],
    ['swap', settings.swap],
    ['localhostForwarding', String(settings.localhostForwarding)],
  ];
}

/**
 * Update or append the resource keys in `[wsl2]`. Keys match
 * case-insensitively, as WSL reads them. Other sections are untouched.
 */
export function mergeWslConfig(existing: IniDocument, settings: WslSettings): IniDocument {
  const sections = existing.sections.map((section) => ({ ...section, lines: [...section.lines] }));
  let target = sections.find((section) => section.name?.toLowerCase() === WSL2_SECTION);
  if (!target) {
    target = { name: WSL2_SECTION, lines: [] };
    const previous = sections[sections.length - 1];
    if (previous && previous.lines[previous.lines.length - 1]?.kind !== 'blank') {
      previous.lines.push({ kind: 'blank' });
    }
    sections.push(target);
  }

  for (const [key, value] of settingsToEntries(settings)) {
    const index = target.lines.findIndex(
      (line) => line.kind === 'entry' && line.key.toLowerCase() === key.toLowerCase()
    );
    const entry: IniLine = { kind: 'entry', key, value };
    if (index === -1) {
      target.lines.splice(lastEntryIndex(target.lines) + 1, 0, entry);
    } else {
      target.lines[index] = entry;
    }
  }

  return { sections };
}

function lastEntryIndex(lines: IniLine[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].kind !== 'blank') return i;
  }
  return -1;
}

// ============================================================================
// FILE
// ============================================================================

export async function buildWslConfig(
  windowsHome: string,
  settings: WslSettings
): Promise<{ file: string; content: string; existed: boolean }> {
  const file = path.join(windowsHome, WSLCONFIG_FILE);
  let existingText: string | null;
  try {
    existingText = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) throw error;
    existingText = null;
  }
  const merged = mergeWslConfig(parseIni(existingText ?? ''), settings);
  return { file, content: renderIni(merged), existed: existingText !== null };
}
