export const DEFAULT_RANDOM_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

let state: number | undefined;

/**
 * Seeds the process-wide pseudorandom source.
 *
 * Call once at startup. Without an explicit call the source seeds itself
 * from the clock the first time a string is generated.
 */
export function seedPseudorandom(seed: number = Date.now()): void {
  state = seed >>> 0;
}

// mulberry32
function nextRandom(): number {
  if (state === undefined) {
    seedPseudorandom();
  }

  state = ((state ?? 0) + 0x6d2b79f5) >>> 0;
  let t = state;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
}

/**
 * Generates a pseudorandom string of the given length drawn from `alphabet`.
 *
 * Not suitable for anything security sensitive; use `crypto.randomBytes`
 * there instead.
 */
export function pseudorandomString(
  length: number,
  alphabet: string = DEFAULT_RANDOM_ALPHABET,
): string {
  let result = '';

  for (let i = 0; i < length; i++) {
    result += alphabet.charAt(Math.floor(nextRandom() * alphabet.length));
  }

  return result;
}
