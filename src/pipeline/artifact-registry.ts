import type { Artifact } from './pipeline.types';

/**
 * Per-run artifact handoff. One producer per name; a consumer takes the artifact over
 * and it leaves the registry.
 */
export class ArtifactRegistry {
  private readonly artifacts = new Map<string, Artifact>();
  private readonly consumed = new Set<string>();

  register(artifact: Artifact): void {
    if (this.artifacts.has(artifact.name) || this.consumed.has(artifact.name)) {
      throw new Error(`Artifact "${artifact.name}" was already produced in this run`);
    }
    this.artifacts.set(artifact.name, artifact);
  }

  take(name: string): Artifact | undefined {
    const artifact = this.artifacts.get(name);
    if (!artifact) return undefined;
    this.artifacts.delete(name);
    this.consumed.add(name);
    return artifact;
  }
}
