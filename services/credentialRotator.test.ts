import { describe, expect, it } from 'vitest';
import { CredentialRotator } from './credentialRotator';
import { ConfigurationError } from './errors';

function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

describe('CredentialRotator', () => {
  it('draws every credential exactly once per cycle', () => {
    const credentials = ['k1', 'k2', 'k3', 'k4', 'k5'];
    const rotator = new CredentialRotator(credentials);

    for (let cycle = 0; cycle < 4; cycle++) {
      const drawn = credentials.map(() => rotator.next());
      expect([...drawn].sort()).toEqual(credentials);
    }
  });

  it('reshuffles into a new permutation when a cycle is exhausted', () => {
    // zeros swap every position with the head, values near one leave the order alone
    const rotator = new CredentialRotator(['A', 'B', 'C'], sequence(0, 0, 0.999, 0.999));

    const drawn = Array.from({ length: 6 }, () => rotator.next());

    expect(drawn).toEqual(['B', 'C', 'A', 'A', 'B', 'C']);
  });

  it('keeps its own copy of the credential set', () => {
    const credentials = ['A'];
    const rotator = new CredentialRotator(credentials);
    credentials.push('B');

    expect(rotator.size).toBe(1);
    expect([rotator.next(), rotator.next()]).toEqual(['A', 'A']);
  });

  it('rejects an empty credential set', () => {
    expect(() => new CredentialRotator([])).toThrow(ConfigurationError);
  });

  it('rejects empty credentials', () => {
    expect(() => new CredentialRotator(['A', ''])).toThrow('Credentials must be non-empty');
  });
});
