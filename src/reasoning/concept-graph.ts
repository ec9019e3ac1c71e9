/**
 * ConceptGraph: adjacency of concept name → related concept names.
 *
 * A name is a concept once it has an adjacency entry. Relation targets do not
 * become concepts on their own, so traversal can reach names the graph knows
 * nothing about.
 */

export const LOGICAL_OPERATORS: readonly string[] = [
  'AND', 'OR', 'NOT', 'IMPLIES', 'IFF', 'FORALL', 'EXISTS', 'EQUALS', 'NOT_EQUALS',
];

export class ConceptGraph {
  private adjacency = new Map<string, Set<string>>();

  /** Graph seeded with the logical operators, each linked to `operator_<NAME>`. */
  static withLogicalOperators(): ConceptGraph {
    const graph = new ConceptGraph();
    for (const op of LOGICAL_OPERATORS) {
      graph.addRelation(op, `operator_${op}`);
    }
    return graph;
  }

  addConcept(name: string): void {
    if (!this.adjacency.has(name)) {
      this.adjacency.set(name, new Set());
    }
  }

  addRelation(source: string, target: string): void {
    this.addConcept(source);
    this.adjacency.get(source)?.add(target);
  }

  has(name: string): boolean {
    return this.adjacency.has(name);
  }

  /** Related names in insertion order; empty for unknown names. */
  neighbors(name: string): string[] {
    return [...(this.adjacency.get(name) ?? [])];
  }

  /** A concept whose name equals `name` ignoring case, other than `name` itself. */
  findCaseInsensitive(name: string): string | undefined {
    const lower = name.toLowerCase();
    for (const concept of this.adjacency.keys()) {
      if (concept !== name && concept.toLowerCase() === lower) {
        return concept;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.adjacency.size;
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [concept, related] of this.adjacency) {
      out[concept] = [...related];
    }
    return out;
  }
}
