// Signature normalization helpers shared by detection and realignment

/**
 * Collapses whitespace and removes spacing around punctuation,
 * so `calc(a, b)` and `calc(a,b)` compare equal
 */
export function normalizeSignature(signature: string): string {
  return signature
    .replace(/\s+/g, ' ')
    .replace(/\s*([(),:<>[\]{}=|&?])\s*/g, '$1')
    .trim();
}

/**
 * Reads a keyed entry only when the record itself holds it; element IDs such as
 * `constructor` must not resolve to inherited members
 */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export function signaturesEqual(a: string, b: string): boolean {
  return normalizeSignature(a) === normalizeSignature(b);
}

/**
 * Counts top-level parameters of a call signature
 *
 * @returns null when the signature has no parameter list
 */
export function countParameters(signature: string): number | null {
  const open = signature.indexOf('(');
  if (open === -1) return null;

  let depth = 0;
  let count = 0;
  let sawContent = false;

  for (let i = open + 1; i < signature.length; i++) {
    const ch = signature[i];

    // arrow in a function type
    if (ch === '>' && signature[i - 1] === '=') {
      continue;
    }

    if (ch === '(' || ch === '<' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === '>' || ch === ']' || ch === '}') {
      if (depth === 0 && ch === ')') {
        return sawContent ? count + 1 : 0;
      }
      depth--;
    } else if (ch === ',' && depth === 0) {
      count++;
      continue;
    }

    if (!/\s/.test(ch)) {
      sawContent = true;
    }
  }

  return null;
}

/**
 * Strips range operators from a version constraint (`^1.2.0` -> `1.2.0`)
 */
export function normalizeVersion(version: string): string {
  return version.trim().replace(/^[\^~=v<>\s]+/, '');
}
