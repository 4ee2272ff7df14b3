import { ParameterSet, ParamValue } from '../core/Types';
import { Topic } from '../topics/TopicsRepository';
import { InlineLimit } from '../topics/Schemas';

export interface InlineParseResult {
  /** The text with every recognised parameter fragment removed. */
  prompt: string;
  params: ParameterSet;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

const INT_KEYS = new Set(['steps', 'width', 'height', 'n', 'seed']);
const FLOAT_KEYS = new Set(['fps', 'length']);
const STRING_KEYS = new Set(['model', 'text']);

const FENCED_TEXT = /\btext\s*```([\s\S]*?)```/i;
const TAIL_TEXT = /\btext\s*:\s*([\s\S]+)$/i;
const KEY_VALUE = () => /\b(steps|width|height|n|seed|model|fps|length|text)\s*=\s*("[^"]*"|'[^']*'|\S+)/gi;

/** First integer in `s`, ignoring surrounding punctuation: "1080," -> 1080. */
export function parseIntToken(s: string): number | null {
  const m = /[-+]?\d+/.exec(s);
  return m ? parseInt(m[0], 10) : null;
}

/** First decimal in `s`; a comma is accepted as the separator: "16,5" -> 16.5. */
export function parseFloatToken(s: string): number | null {
  const m = /[-+]?\d+(?:[.,]\d+)?/.exec(s);
  return m ? parseFloat(m[0].replace(',', '.')) : null;
}

function unquote(raw: string): string {
  if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Pull `key=value` overrides and a long `text` field out of a request.
 *
 * `text` can be given as a fenced block (text```...```), as a tail
 * (`text: ...` up to the end), or as `text="..."`. The fenced and tail forms
 * win over `text=`.
 */
export function parseInlineParams(text: string): InlineParseResult {
  const params: ParameterSet = {};
  let working = text ?? '';
  let longText: string | null = null;

  const fenced = FENCED_TEXT.exec(working);
  if (fenced) {
    longText = fenced[1].trim();
    working = working.slice(0, fenced.index) + working.slice(fenced.index + fenced[0].length);
  } else {
    const tail = TAIL_TEXT.exec(working);
    if (tail) {
      longText = tail[1].trim();
      working = working.slice(0, tail.index);
    }
  }

  for (const m of working.matchAll(KEY_VALUE())) {
    const key = m[1].toLowerCase();
    const value = unquote(m[2]);
    if (INT_KEYS.has(key)) {
      const v = parseIntToken(value);
      if (v !== null) params[key] = v;
    } else if (FLOAT_KEYS.has(key)) {
      const v = parseFloatToken(value);
      if (v !== null) params[key] = v;
    } else if (STRING_KEYS.has(key)) {
      params[key] = value;
    }
  }

  const prompt = working.replace(KEY_VALUE(), '').trim().replace(/\s{2,}/g, ' ');

  if (longText) params['text'] = longText;

  return { prompt, params };
}

// ─────────────────────────────────────────────
// Merging
// ─────────────────────────────────────────────

function clampTo(limit: InlineLimit | undefined, value: number): number {
  if (!limit) return value;
  let v = value;
  if (typeof limit.min === 'number') v = Math.max(v, limit.min);
  if (typeof limit.max === 'number') v = Math.min(v, limit.max);
  // Integers stay integers.
  return Number.isInteger(value) ? Math.trunc(v) : v;
}

function clampParam(limits: Record<string, InlineLimit>, key: string, value: ParamValue): ParamValue {
  return typeof value === 'number' ? clampTo(limits[key], value) : value;
}

export type MergeSource = Pick<Topic, 'nodeDefaults' | 'defaults' | 'inlineAllowed' | 'inlineLimits'>;

/**
 * Effective parameters for one request, lowest precedence first:
 *
 *   nodes.json defaults
 *   meta.json defaults
 *   width/height from the input image, where the default is 0
 *   inline overrides (allow-list filtered, clamped to the topic limits)
 *
 * When a limit cuts one side of width/height, both sides are scaled by the
 * same factor before the final clamp, so the aspect ratio holds where the
 * limits allow it.
 */
export function mergeParams(
  topic: MergeSource,
  inline: ParameterSet,
  inputDims: ImageDimensions | null = null,
): ParameterSet {
  const params: ParameterSet = { ...topic.nodeDefaults, ...topic.defaults };

  if (inputDims) {
    if (params['width'] === 0) params['width'] = Math.trunc(inputDims.width);
    if (params['height'] === 0) params['height'] = Math.trunc(inputDims.height);
  }

  const allowed = topic.inlineAllowed;
  const filtered: ParameterSet = {};
  for (const [key, value] of Object.entries(inline)) {
    const k = key.toLowerCase();
    if (allowed === null || allowed.includes(k)) filtered[k] = value;
  }

  const limits = topic.inlineLimits;
  const result: ParameterSet = { ...params };
  for (const [key, value] of Object.entries(filtered)) {
    if (key === 'width' || key === 'height') continue;
    result[key] = clampParam(limits, key, value);
  }

  const w = 'width' in filtered ? filtered['width'] : result['width'];
  const h = 'height' in filtered ? filtered['height'] : result['height'];

  if (typeof w === 'number' && typeof h === 'number') {
    const wPre = clampTo(limits['width'], w);
    const hPre = clampTo(limits['height'], h);

    const scales: number[] = [];
    if (wPre !== w && w !== 0) scales.push(wPre / w);
    if (hPre !== h && h !== 0) scales.push(hPre / h);

    if (scales.length > 0) {
      const downs = scales.filter((s) => s < 1);
      const ups = scales.filter((s) => s > 1);
      const scale = downs.length > 0 ? Math.min(...downs) : ups.length > 0 ? Math.max(...ups) : 1;
      result['width'] = Math.round(clampTo(limits['width'], Math.round(w * scale)));
      result['height'] = Math.round(clampTo(limits['height'], Math.round(h * scale)));
    } else {
      result['width'] = Math.round(clampTo(limits['width'], w));
      result['height'] = Math.round(clampTo(limits['height'], h));
    }
  } else {
    if (typeof w === 'number') result['width'] = Math.round(clampTo(limits['width'], w));
    if (typeof h === 'number') result['height'] = Math.round(clampTo(limits['height'], h));
  }

  return result;
}
