import { md5 } from '@noble/hashes/legacy';
import { concatBytes } from '@noble/hashes/utils';
import { xorChecksum } from './buffer-utils';
import {
  CRX_RESPONSE_LENGTH,
  CRX_SIGNATURE,
  DEFAULT_SECRET_KEY,
  MIN_CHALLENGE_LENGTH_FOR_RESPONSE,
} from './constants';
import { InvalidChallengeSignatureError } from './errors';
import type { AuthVariant } from './types';

const SIGNATURE = Uint8Array.from(CRX_SIGNATURE);

/**
 * Half-open byte range `[start, end)` of the challenge fed to MD5.
 */
export interface ChallengeSlice {
  start: number;
  end: number;
}

export function hasCrxSignature(data: Uint8Array): boolean {
  return (
    data.length >= SIGNATURE.length &&
    SIGNATURE.every((byte, i) => data[i] === byte)
  );
}

/**
 * Picks the challenge bytes hashed for a given variant.
 *
 * Classic boards hash everything between the signature and the trailing
 * check byte. The newer variants have been observed to hash fixed windows
 * whose position depends on how much challenge arrived; shorter challenges
 * fall back to the classic window.
 */
export function selectChallengeSlice(
  challengeLength: number,
  variant: AuthVariant,
): ChallengeSlice {
  const classic = { start: 3, end: Math.max(3, challengeLength - 1) };

  switch (variant) {
    case 'gts':
      if (challengeLength >= 19) return { start: 3, end: 19 };
      if (challengeLength >= 16) return { start: 4, end: 16 };
      return classic;
    case 'gt':
      if (challengeLength >= 16) return { start: 4, end: 16 };
      return classic;
    case 'classic':
    case 'unknown':
      return classic;
  }
}

/**
 * Computes the unlock response: `CRX ++ MD5(slice ++ key) ++ xor`.
 * The trailing byte is the XOR of the signature and digest bytes.
 *
 * @throws InvalidChallengeSignatureError if the challenge lacks the CRX
 *   signature or is too short to carry a payload
 */
export function computeChallengeResponse(
  challenge: Uint8Array,
  variant: AuthVariant = 'classic',
  secretKey: ArrayLike<number> = DEFAULT_SECRET_KEY,
): Uint8Array {
  if (
    !hasCrxSignature(challenge) ||
    challenge.length < MIN_CHALLENGE_LENGTH_FOR_RESPONSE
  ) {
    throw new InvalidChallengeSignatureError(Array.from(challenge.slice(0, 3)));
  }

  const { start, end } = selectChallengeSlice(challenge.length, variant);
  const digest = md5(
    concatBytes(challenge.slice(start, end), Uint8Array.from(secretKey)),
  );
  const body = concatBytes(SIGNATURE, digest);
  return concatBytes(body, Uint8Array.of(xorChecksum(body)));
}

/**
 * Checks a response frame's signature, length and trailing check byte.
 */
export function isWellFormedResponse(response: Uint8Array): boolean {
  if (response.length !== CRX_RESPONSE_LENGTH) return false;
  if (!hasCrxSignature(response)) return false;
  const body = response.subarray(0, response.length - 1);
  return xorChecksum(body) === response[response.length - 1];
}
