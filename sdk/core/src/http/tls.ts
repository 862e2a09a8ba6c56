import { readFileSync } from 'node:fs';
import { Agent } from 'undici';

/**
 * Certificate verification setting: `true` trusts the system store, `false`
 * disables verification, a string is the path of a PEM bundle to trust.
 */
export type TlsVerify = boolean | string;

/**
 * Builds the undici dispatcher for a verification setting. Returns undefined
 * for `true` so requests go through the global dispatcher.
 *
 * The bundle is read right away, so an unreadable path fails here with the
 * fs error rather than on the first request.
 */
export function createDispatcher(verify: TlsVerify): Agent | undefined {
  if (verify === true) return undefined;
  if (verify === false) {
    return new Agent({ connect: { rejectUnauthorized: false } });
  }
  const ca = readFileSync(verify);
  return new Agent({ connect: { ca } });
}
