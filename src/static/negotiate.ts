/**
 * Accept-Encoding negotiation between an original file and its gzip twin.
 */

import type { EncodingDecision, ResolvedAsset } from './types.js';

interface EncodingPreference {
  coding: string;
  quality: number;
}

const QVALUE = /^(?:0(?:\.\d{0,3})?|1(?:\.0{0,3})?)$/;

/**
 * Parse `Accept-Encoding` into codings with their q-values. An entry whose
 * q-value is not a valid qvalue is dropped.
 */
export function parseAcceptEncoding(headerValue: string | null): EncodingPreference[] {
  if (!headerValue) {
    return [];
  }

  const preferences: EncodingPreference[] = [];
  for (const part of headerValue.split(',')) {
    const [coding, ...params] = part.split(';').map(value => value.trim());
    if (coding.length === 0) {
      continue;
    }

    let quality: number | null = 1;
    for (const param of params) {
      const separator = param.indexOf('=');
      if (separator === -1 || param.slice(0, separator).trim().toLowerCase() !== 'q') {
        continue;
      }
      const value = param.slice(separator + 1).trim();
      quality = QVALUE.test(value) ? Number.parseFloat(value) : null;
      if (quality === null) {
        break;
      }
    }

    if (quality !== null) {
      preferences.push({ coding: coding.toLowerCase(), quality });
    }
  }
  return preferences;
}

/**
 * Whether the client takes gzip. An explicit `gzip` (or `x-gzip`) entry wins
 * over `*`; `q=0` refuses.
 */
export function acceptsGzip(headerValue: string | null): boolean {
  const preferences = parseAcceptEncoding(headerValue);

  const explicit = preferences.filter(pref => pref.coding === 'gzip' || pref.coding === 'x-gzip');
  if (explicit.length > 0) {
    return explicit.some(pref => pref.quality > 0);
  }

  const wildcard = preferences.find(pref => pref.coding === '*');
  return wildcard !== undefined && wildcard.quality > 0;
}

/** Pick the representation to send for a resolved asset. */
export function chooseEncoding(asset: ResolvedAsset, acceptEncoding: string | null): EncodingDecision {
  if (asset.compressible && asset.gzip && acceptsGzip(acceptEncoding)) {
    return { kind: 'precompressed-gzip', variant: asset.gzip };
  }
  return { kind: 'original', variant: asset.original };
}
