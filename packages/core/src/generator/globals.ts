import { readFileSync } from 'node:fs';

import type { EntropySource } from '../entropy/source.js';

export interface GlobalName {
  readonly module: string;
  readonly name: string;
}

export const DEFAULT_GLOBAL: GlobalName = Object.freeze({
  module: 'builtins',
  name: 'object',
});

const WORD_LIST_URL = new URL('../../data/module-globals.txt', import.meta.url);

let cached: readonly string[] | undefined;

export function parseWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && !entry.startsWith('#'));
}

/** Loaded on first use, then kept for the life of the process. */
export function loadWordList(): readonly string[] {
  cached ??= Object.freeze(parseWordList(readFileSync(WORD_LIST_URL, 'utf8')));
  return cached;
}

/** `module.attr` split on the first dot; no dot means the default pair. */
export function splitGlobal(entry: string): GlobalName {
  const dot = entry.indexOf('.');
  if (dot <= 0 || dot === entry.length - 1) return DEFAULT_GLOBAL;
  return { module: entry.slice(0, dot), name: entry.slice(dot + 1) };
}

export function randomGlobal(source: EntropySource): GlobalName {
  const words = loadWordList();
  const entry = words[source.chooseIndex(words.length)];
  return entry === undefined ? DEFAULT_GLOBAL : splitGlobal(entry);
}
