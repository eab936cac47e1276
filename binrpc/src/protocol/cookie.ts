// Per-packet correlation cookie. Cookies only need to be distinguishable between
// requests in flight, not globally unique.
export interface CookieSource {
  next(): number;
}

export const defaultCookieSource: CookieSource = {
  next: () => Math.floor(Math.random() * 0x100000000) >>> 0,
};

// Deterministic source; wraps at 2^32.
export function sequenceCookieSource(start = 1): CookieSource {
  let current = start >>> 0;
  return {
    next: () => {
      const c = current;
      current = (current + 1) >>> 0;
      return c;
    },
  };
}
