export * from './hmac-signature.verifier';
