const GROUPED_INT_PATTERN = /^[0-9]{1,3}(?:[,.\s\u00a0\u202f][0-9]{3})+$/
const COMPACT_COUNT_PATTERN = /^([0-9]+(?:[.,][0-9]+)?)([kKmM])$/

/**
 * Parses review counts as listings print them: `128`, `"1,204"`, `"(1,204)"`,
 * `"1.2K"`. Anything that is not a whole count yields `null`.
 */
export const coerceInt = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : null
  }
  if (typeof value !== "string") {
    return null
  }

  const compact = value.trim().replaceAll(/^\(|\)$/g, "").trim()
  if (/^[0-9]+$/.test(compact)) {
    return Number.parseInt(compact, 10)
  }
  if (GROUPED_INT_PATTERN.test(compact)) {
    return Number.parseInt(compact.replaceAll(/[^0-9]/g, ""), 10)
  }

  const suffixed = COMPACT_COUNT_PATTERN.exec(compact)
  if (suffixed) {
    const base = Number.parseFloat(suffixed[1].replace(",", "."))
    const multiplier = suffixed[2].toLowerCase() === "k" ? 1_000 : 1_000_000
    return Math.round(base * multiplier)
  }
  return null
}

const normalizeFloatString = (value: string): string | null => {
  const compact = value.replaceAll(/[\s\u00a0\u202f]/g, "").trim()
  if (!compact || !/^[+-]?[0-9][0-9.,]*$/.test(compact)) {
    return null
  }

  const sign = compact[0] === "-" || compact[0] === "+" ? compact[0] : ""
  const digits = sign ? compact.slice(1) : compact
  const commaCount = (digits.match(/,/g) ?? []).length
  const dotCount = (digits.match(/\./g) ?? []).length

  if (commaCount > 0 && dotCount > 0) {
    const lastComma = digits.lastIndexOf(",")
    const lastDot = digits.lastIndexOf(".")
    if (lastComma > lastDot) {
      return `${sign}${digits.replaceAll(".", "").replaceAll(",", ".")}`
    }
    return `${sign}${digits.replaceAll(",", "")}`
  }

  if (commaCount === 1) {
    return `${sign}${digits.replace(",", ".")}`
  }
  if (commaCount > 1 || dotCount > 1) {
    return null
  }
  return `${sign}${digits}`
}

/** Parses ratings such as `4.5`, `"4,5"` or `"4.5 stars"`. */
export const coerceFloat = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value !== "string") {
    return null
  }

  const leading = /^\s*([+-]?[0-9][0-9.,\s]*)/.exec(value)
  if (!leading) {
    return null
  }
  const normalized = normalizeFloatString(leading[1])
  if (normalized === null) {
    return null
  }
  const parsed = Number.parseFloat(normalized)
  return Number.isFinite(parsed) ? parsed : null
}
