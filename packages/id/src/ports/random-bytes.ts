/**
 * Source of cryptographically secure random bytes.
 *
 * Implementations throw when the underlying source is unavailable; they never
 * return predictable bytes in its place.
 */
export type RandomBytes = (size: number) => Uint8Array

export type HostnameSource = () => string
