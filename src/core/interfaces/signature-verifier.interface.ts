/**
 * Authenticates a raw body against a shared secret.
 * verify never throws; every failure is reported as false.
 */
export interface SignatureVerifier {
  sign(secret: string, rawBody: Buffer): string;
  verify(secret: string, rawBody: Buffer, providedSignature: string): boolean;
}
