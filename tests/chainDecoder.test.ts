import { describe, it, expect } from 'vitest';
import { commonNameOf, decodeChain } from '../src/modules/chainDecoder.js';
import { createTestCertificate, toDer } from './helpers/certs.js';

describe('commonNameOf', () => {
  it('reads the CN line of a multi-line name', () => {
    expect(commonNameOf("C=US\nO=Let's Encrypt\nCN=R3")).toBe('R3');
  });

  it('returns an empty string when there is no CN', () => {
    expect(commonNameOf('O=Example Org')).toBe('');
    expect(commonNameOf('')).toBe('');
  });

  it('keeps the last CN when several are present', () => {
    expect(commonNameOf('CN=first\nCN=second')).toBe('second');
  });
});

describe('decodeChain', () => {
  const leaf = toDer(createTestCertificate({ subject: 'example.com', issuer: 'R3' }));
  const intermediate = toDer(createTestCertificate({ subject: 'OtherCA', issuer: 'Root' }));

  it('decodes DER records in order', () => {
    expect(decodeChain([leaf, intermediate])).toEqual([
      { subjectCommonName: 'example.com', issuerCommonName: 'R3' },
      { subjectCommonName: 'OtherCA', issuerCommonName: 'Root' },
    ]);
  });

  it('drops malformed records and keeps the rest in order', () => {
    const chain = decodeChain([
      Buffer.from('not a certificate'),
      leaf,
      Buffer.alloc(0),
      leaf.subarray(0, 40),
      intermediate,
    ]);

    expect(chain.map((cert) => cert.subjectCommonName)).toEqual(['example.com', 'OtherCA']);
  });

  it('returns an empty chain when nothing parses', () => {
    expect(decodeChain([])).toEqual([]);
    expect(decodeChain([Buffer.from([0x30, 0x03, 0x02, 0x01, 0x01])])).toEqual([]);
  });

  it('reports a missing subject CN as an empty string', () => {
    const der = toDer(createTestCertificate({ organization: 'Example Org', issuer: 'R3' }));
    expect(decodeChain([der])).toEqual([{ subjectCommonName: '', issuerCommonName: 'R3' }]);
  });

  it('ignores other subject attributes', () => {
    const der = toDer(createTestCertificate({ organization: 'Example Org', subject: 'shop.example', issuer: 'R3' }));
    expect(decodeChain([der])).toEqual([{ subjectCommonName: 'shop.example', issuerCommonName: 'R3' }]);
  });
});
