/**
 * Syntax highlighting formats accepted by `api_paste_format`.
 *
 * The list lives in `data/highlighting-formats.json` at the package root so
 * the same relative path resolves from `src/` and from `dist/`.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const FORMATS_FILE = new URL('../../data/highlighting-formats.json', import.meta.url);

const formatsSchema = z.array(z.string().min(1)).nonempty();

function loadFormats(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(readFileSync(FORMATS_FILE, 'utf8'));
  return new Set(formatsSchema.parse(raw));
}

export const HIGHLIGHTING_FORMATS: ReadonlySet<string> = loadFormats();

export function isHighlighting(value: string): boolean {
  return HIGHLIGHTING_FORMATS.has(value);
}
