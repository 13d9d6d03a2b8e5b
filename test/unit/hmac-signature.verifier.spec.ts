import { HmacSignatureVerifier } from '../../src';

describe('HmacSignatureVerifier', () => {
  const verifier = new HmacSignatureVerifier();

  const scenarioBody = Buffer.from(
    '{"message_id":"m1","from":"+919876543210","to":"+14155550100","ts":"2025-01-15T10:00:00Z","text":"hi"}',
  );
  const scenarioSignature =
    '74aa479f3cbeba1f1f0a0effbd2b3f51550028d3e37d84fe8ff6e07d576c4221';

  describe('sign', () => {
    it('should produce lowercase hex HMAC-SHA256 of the raw bytes', () => {
      expect(verifier.sign('test-secret', Buffer.from('hello'))).toBe(
        'bcc889a40667cab715e1dc22ad280692cf4bf1c3a280eeeca60d8dbcd8e4b993',
      );
      expect(verifier.sign('s3cr3t', scenarioBody)).toBe(scenarioSignature);
    });
  });

  describe('verify', () => {
    it('should accept the correct signature', () => {
      expect(verifier.verify('s3cr3t', scenarioBody, scenarioSignature)).toBe(true);
    });

    it('should accept uppercase hex', () => {
      expect(
        verifier.verify('s3cr3t', scenarioBody, scenarioSignature.toUpperCase()),
      ).toBe(true);
    });

    it('should reject a signature made with another secret', () => {
      expect(verifier.verify('other-secret', scenarioBody, scenarioSignature)).toBe(
        false,
      );
    });

    it('should reject when a single byte of the body changes', () => {
      const tampered = Buffer.from(scenarioBody.toString().replace('"hi"', '"ho"'));
      expect(verifier.verify('s3cr3t', tampered, scenarioSignature)).toBe(false);
    });

    it('should reject signatures of the wrong length without throwing', () => {
      expect(verifier.verify('s3cr3t', scenarioBody, 'abc')).toBe(false);
      expect(verifier.verify('s3cr3t', scenarioBody, `${scenarioSignature}00`)).toBe(
        false,
      );
    });

    it('should reject an empty signature or secret', () => {
      expect(verifier.verify('s3cr3t', scenarioBody, '')).toBe(false);
      expect(verifier.verify('', scenarioBody, scenarioSignature)).toBe(false);
    });

    it('should not be fooled by re-serialized JSON with the same meaning', () => {
      const reformatted = Buffer.from(
        JSON.stringify(JSON.parse(scenarioBody.toString()), null, 2),
      );
      expect(verifier.verify('s3cr3t', reformatted, scenarioSignature)).toBe(false);
    });
  });
});
