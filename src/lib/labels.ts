/**
 * Label set
 *
 * The closed set of categories a record may carry. Anything the service
 * returns outside this set is mapped to UNKNOWN_LABEL at the boundary and
 * then to FALLBACK_LABEL; free strings never travel past parseLabel().
 */

export const LABEL_VALUES = ['Hindu', 'Christian', 'Muslim'] as const
export type Label = (typeof LABEL_VALUES)[number]

/** Assigned when validation or retries fail */
export const FALLBACK_LABEL: Label = 'Hindu'

export const UNKNOWN_LABEL = Symbol('unknown-label')
export type ParsedLabel = Label | typeof UNKNOWN_LABEL

export function isLabel(value: unknown): value is Label {
  return typeof value === 'string' && (LABEL_VALUES as readonly string[]).includes(value)
}

/**
 * Maps a raw value onto the closed set. Only exact members match:
 * "hindu" or " Hindu " is UNKNOWN_LABEL.
 */
export function parseLabel(raw: unknown): ParsedLabel {
  return isLabel(raw) ? raw : UNKNOWN_LABEL
}

/**
 * Resolves a raw value to a usable label, reporting whether the fallback
 * had to be substituted.
 */
export function resolveLabel(raw: unknown): { label: Label; fallback: boolean } {
  const parsed = parseLabel(raw)
  if (parsed === UNKNOWN_LABEL) {
    return { label: FALLBACK_LABEL, fallback: true }
  }
  return { label: parsed, fallback: false }
}
