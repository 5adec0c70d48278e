/**
 * commit-warden CLI
 *
 * `warden lint`, `warden suggest` and `warden check`.
 *
 * @module @commit-warden/cli
 */

export * from './cli';
