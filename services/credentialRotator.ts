import { ConfigurationError } from './errors';

export type RandomSource = () => number;

function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/**
 * Hands out credentials in randomized round-robin order: each credential is
 * drawn once per cycle, and every cycle is a fresh permutation of the set.
 */
export class CredentialRotator {
  private readonly credentials: readonly string[];
  private queue: string[] = [];

  constructor(credentials: readonly string[], private readonly random: RandomSource = Math.random) {
    if (credentials.length === 0) {
      throw new ConfigurationError('At least one credential is required');
    }
    if (credentials.some(credential => credential.length === 0)) {
      throw new ConfigurationError('Credentials must be non-empty');
    }
    this.credentials = Object.freeze([...credentials]);
  }

  get size(): number {
    return this.credentials.length;
  }

  next(): string {
    if (this.queue.length === 0) {
      this.queue = shuffle(this.credentials, this.random);
    }
    const [credential] = this.queue.splice(0, 1);
    return credential;
  }
}
