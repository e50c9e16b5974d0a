/**
 * Thrown when the factory config names no species, or one the registry
 * does not know. Recovered only by reconfiguring (`millctl set species <kind>`).
 */
export class UnknownSpeciesError extends Error {
  public readonly kind: string | null;
  public readonly known: readonly string[];

  constructor(kind: string | null, known: readonly string[]) {
    const listing = known.length > 0 ? known.join(", ") : "(none registered)";
    super(
      kind === null
        ? `UnknownSpeciesError: no species configured; choose one of: ${listing}`
        : `UnknownSpeciesError: unknown species "${kind}"; choose one of: ${listing}`,
    );
    this.name = "UnknownSpeciesError";
    this.kind = kind;
    this.known = known;
    Object.setPrototypeOf(this, UnknownSpeciesError.prototype);
  }
}
