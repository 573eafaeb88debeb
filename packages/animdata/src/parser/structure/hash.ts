/**
 * Number of hash buckets in an animation table.
 */
export const BUCKET_COUNT = 256;

/**
 * Compute the bucket an identifier belongs to.
 * Sum of the upper-cased character codes, modulo the bucket count.
 */
export function hashIdentifier(identifier: string): number {
  const upper = identifier.toUpperCase();
  let sum = 0;
  for (let i = 0; i < upper.length; i++) {
    sum += upper.charCodeAt(i);
  }
  return sum % BUCKET_COUNT;
}
