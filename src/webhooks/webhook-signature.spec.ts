import { canonicalJson, formatSignatureHeader, signPayload, verifySignature } from './webhook-signature';

const BODY =
  '{"data":{"id":1},"event":"application.created","timestamp":"2026-01-01T00:00:00.000Z"}';

describe('webhook signature', () => {
  describe('signPayload', () => {
    it('computes the lowercase hex HMAC-SHA256 of the body', () => {
      expect(signPayload(BODY, 'test-secret')).toBe(
        '308d23ae7df7d5d2ded9363452d25f0d468b0c89ba2987309043db7f968cda63',
      );
    });

    it('is deterministic and always 64 hex characters', () => {
      const payloads = ['', '{}', BODY, 'ünïcödé', 'x'.repeat(10_000)];
      for (const payload of payloads) {
        const first = signPayload(payload, 'test-secret');
        expect(signPayload(payload, 'test-secret')).toBe(first);
        expect(first).toMatch(/^[0-9a-f]{64}$/);
      }
    });

    it('signs strings and buffers of the same bytes identically', () => {
      expect(signPayload(Buffer.from(BODY, 'utf8'), 'test-secret')).toBe(signPayload(BODY, 'test-secret'));
    });

    it('depends on the secret', () => {
      expect(signPayload(BODY, 'other-secret')).toBe(
        '83a9f98ab1197aca39a63812ff381b9d840f36b5f563003341466bc6d65c0288',
      );
    });
  });

  describe('verifySignature', () => {
    const header = formatSignatureHeader(signPayload(BODY, 'test-secret'));

    it('accepts the header produced for the same body and secret', () => {
      expect(header.startsWith('sha256=')).toBe(true);
      expect(verifySignature(BODY, 'test-secret', header)).toBe(true);
    });

    it('rejects a different secret, a modified body, or a malformed header', () => {
      expect(verifySignature(BODY, 'other-secret', header)).toBe(false);
      expect(verifySignature(`${BODY} `, 'test-secret', header)).toBe(false);
      expect(verifySignature(BODY, 'test-secret', header.slice('sha256='.length))).toBe(false);
      expect(verifySignature(BODY, 'test-secret', 'sha256=abcd')).toBe(false);
    });
  });

  describe('canonicalJson', () => {
    it('sorts keys at every level and keeps array order', () => {
      const value = { timestamp: 't', event: 'e', data: { z: 1, a: [{ b: 2, a: 1 }, 3] } };

      expect(canonicalJson(value)).toBe('{"data":{"a":[{"a":1,"b":2},3],"z":1},"event":"e","timestamp":"t"}');
    });

    it('serializes dates as ISO strings', () => {
      expect(canonicalJson({ at: new Date('2026-01-01T00:00:00.000Z') })).toBe('{"at":"2026-01-01T00:00:00.000Z"}');
    });
  });
});
