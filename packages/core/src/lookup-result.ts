export type LookupResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

/**
 * Runs a collaborator lookup and captures a thrown failure as a value, so the
 * caller can substitute its own default.
 */
export function attempt<T>(lookup: () => T): LookupResult<T> {
  try {
    return { ok: true, value: lookup() };
  } catch (error) {
    return { ok: false, error };
  }
}
