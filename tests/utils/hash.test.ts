/**
 * Image fingerprint tests
 */

import { fingerprint } from '../../src/utils/hash';

describe('fingerprint', () => {
  it('should return the base64 MD5 of the bytes', () => {
    expect(fingerprint(Buffer.from('abc'))).toBe('kAFQmDzST7DWlj99KOF/cg==');
  });

  it('should depend only on content', () => {
    expect(fingerprint(Buffer.from('same bytes'))).toBe(fingerprint(Buffer.from('same bytes')));
    expect(fingerprint(Buffer.from('one'))).not.toBe(fingerprint(Buffer.from('two')));
  });
});
