import { ArtifactRegistry } from './artifact-registry';
import { SecretStore } from './secret-store';

describe('SecretStore', () => {
  it('treats empty values as absent', () => {
    const store = new SecretStore({ CODECOV_TOKEN: '', OTHER: undefined });

    expect(store.names()).toEqual([]);
    expect(store.get('OTHER')).toBeUndefined();
  });

  it('picks only the named variables from an environment', () => {
    const store = SecretStore.fromEnv({ CODECOV_TOKEN: 'test-token', HOME: '/root' }, ['CODECOV_TOKEN']);

    expect(store.get('CODECOV_TOKEN')).toBe('test-token');
    expect(store.names()).toEqual(['CODECOV_TOKEN']);
  });

  it('redacts every occurrence of every secret', () => {
    const store = new SecretStore({ A: 'alpha-secret', B: 'beta-secret' });

    expect(store.redact('alpha-secret and beta-secret, alpha-secret again')).toBe(
      '*** and ***, *** again',
    );
  });
});

describe('ArtifactRegistry', () => {
  const artifact = { name: 'report', path: '/w/report.xml', producedBy: 'coverage' };

  it('hands an artifact over to its consumer exactly once', () => {
    const registry = new ArtifactRegistry();
    registry.register(artifact);

    expect(registry.take('report')).toBe(artifact);
    expect(registry.take('report')).toBeUndefined();
  });

  it('refuses to register an artifact again once it was consumed', () => {
    const registry = new ArtifactRegistry();
    registry.register(artifact);
    registry.take('report');

    expect(() => registry.register(artifact)).toThrow('Artifact "report" was already produced in this run');
  });

  it('refuses a second producer', () => {
    const registry = new ArtifactRegistry();
    registry.register(artifact);

    expect(() => registry.register({ ...artifact, producedBy: 'again' })).toThrow(
      'Artifact "report" was already produced in this run',
    );
  });
});
