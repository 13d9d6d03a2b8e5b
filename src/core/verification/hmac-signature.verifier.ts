import * as crypto from 'crypto';
import { SignatureVerifier } from '../interfaces';

/**
 * HMAC signature verifier
 *
 * The digest is taken over the body bytes exactly as received and rendered
 * as lowercase hex. Provided signatures are lowercased before a
 * constant-time comparison, so uppercase hex is accepted.
 */
export class HmacSignatureVerifier implements SignatureVerifier {
  constructor(private readonly algorithm: string = 'sha256') {}

  sign(secret: string, rawBody: Buffer): string {
    return crypto.createHmac(this.algorithm, secret).update(rawBody).digest('hex');
  }

  verify(secret: string, rawBody: Buffer, providedSignature: string): boolean {
    if (!secret || !providedSignature) {
      return false;
    }

    const expected = this.sign(secret, rawBody);
    return this.timingSafeEqual(expected, providedSignature.toLowerCase());
  }

  /**
   * Length is compared first: timingSafeEqual requires equal-sized inputs,
   * and the expected length is fixed by the algorithm, not the secret.
   */
  private timingSafeEqual(a: string, b: string): boolean {
    const bufferA = Buffer.from(a, 'utf8');
    const bufferB = Buffer.from(b, 'utf8');

    if (bufferA.length !== bufferB.length) {
      return false;
    }

    return crypto.timingSafeEqual(bufferA, bufferB);
  }
}
