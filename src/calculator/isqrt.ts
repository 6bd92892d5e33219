/**
 * Integer square root (Babylonian method): the largest `r` such that
 * `r * r <= n`.
 *
 * The first guess is `2^ceil(bits(n) / 2)`, which is never below the root, so
 * the iteration decreases monotonically and stops at the floor root.
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) {
    throw new RangeError(`square root of negative number ${n}`);
  }

  if (n < 2n) {
    return n;
  }

  const bits = BigInt(n.toString(2).length);
  let x = 1n << ((bits + 1n) / 2n);
  let y = (x + n / x) / 2n;

  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }

  return x;
}
