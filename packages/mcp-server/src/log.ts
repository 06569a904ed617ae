/**
 * Server log. stdout carries the protocol, so everything goes to stderr.
 */

const PREFIX = '[wingloft]';

export function log(message: string, ...details: unknown[]): void {
  console.error(PREFIX, message, ...details);
}
