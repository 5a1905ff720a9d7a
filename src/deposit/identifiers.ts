/**
 * Priority-ordered selection of the first present identifier.
 */

/** A labelled accessor; candidates are tried in list order. */
export type IdentifierCandidate<S, T extends string> = readonly [
  type: T,
  accessor: (source: S) => string | undefined,
];

export interface PickedIdentifier<T extends string> {
  type: T;
  value: string;
}

/** Return the first candidate with a non-empty value, labelled with its type. */
export function pickFirstIdentifier<S, T extends string>(
  source: S,
  candidates: ReadonlyArray<IdentifierCandidate<S, T>>
): PickedIdentifier<T> | undefined {
  for (const [type, accessor] of candidates) {
    const value = accessor(source);
    if (value) return { type, value };
  }
  return undefined;
}
