/**
 * Concept tags accepted so far in one run.
 *
 * Immutable: `with()` returns a new registry, so the driver threads the
 * current value from item to item instead of sharing a mutable list.
 */
export class ConceptRegistry {
  private constructor(private readonly tags: readonly string[]) {}

  static empty(): ConceptRegistry {
    return new ConceptRegistry([]);
  }

  static of(tags: readonly string[]): ConceptRegistry {
    return new ConceptRegistry([...tags]);
  }

  get size(): number {
    return this.tags.length;
  }

  get concepts(): readonly string[] {
    return this.tags;
  }

  with(tag: string): ConceptRegistry {
    const trimmed = tag.trim();
    if (!trimmed) return this;
    return new ConceptRegistry([...this.tags, trimmed]);
  }

  /** Bulleted list for prompts; `- None yet` when empty. */
  render(): string {
    if (this.tags.length === 0) return '- None yet';
    return this.tags.map(tag => `- ${tag}`).join('\n');
  }
}
