/**
 * Deterministic pseudo random numbers for generator modules.
 * The same seed parts always give the same sequence (mulberry32 over an FNV-1a hash).
 */
export function createRandom(...seedParts: Array<string | number>): () => number {
  let state = hashSeed(seedParts.join('/'));
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
