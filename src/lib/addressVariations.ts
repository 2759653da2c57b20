/**
 * Textual rewrites of an address, tried in order when the verbatim query
 * finds nothing. Street-line rewrites only touch the first comma-separated
 * segment so that city and state abbreviations survive ("CT" stays
 * Connecticut, not Court).
 */

const STREET_TYPES: ReadonlyArray<[string, string]> = [
  ['St', 'Street'],
  ['Ave', 'Avenue'],
  ['Blvd', 'Boulevard'],
  ['Dr', 'Drive'],
  ['Ln', 'Lane'],
  ['Rd', 'Road'],
  ['Ct', 'Court'],
  ['Pl', 'Place'],
  ['Pkwy', 'Parkway'],
  ['Hwy', 'Highway'],
  ['Cir', 'Circle'],
  ['Trl', 'Trail'],
  ['Ter', 'Terrace']
]

const DIRECTIONS: ReadonlyArray<[string, string]> = [
  ['NE', 'Northeast'],
  ['NW', 'Northwest'],
  ['SE', 'Southeast'],
  ['SW', 'Southwest'],
  ['N', 'North'],
  ['S', 'South'],
  ['E', 'East'],
  ['W', 'West']
]

const EXPANSIONS = [...STREET_TYPES, ...DIRECTIONS].map(
  ([abbreviation, expansion]) => [new RegExp(`\\b${abbreviation}\\b\\.?`, 'gi'), expansion] as const
)

// Route numbers follow these, so a trailing number is not a unit
const NUMBERED_ROUTE_TYPES = new Set(['Hwy'])

const STREET_WORDS = STREET_TYPES.filter(([abbreviation]) => !NUMBERED_ROUTE_TYPES.has(abbreviation))
  .flat()
  .join('|')

const SUITE_PATTERN = /,?\s*(?:\b(?:suite|ste|unit|apt|apartment)\b\.?|#)\s*[\w-]+/gi
const TRAILING_UNIT_PATTERN = new RegExp(`^(.*\\b(?:${STREET_WORDS})\\.?)\\s+#?\\d+[a-z]?$`, 'i')
const ZIP_PATTERN = /\s*\b\d{5}(?:-\d{4})?\b/g

const collapseWhitespace = (value: string): string =>
  value
    .replace(/\s+/g, ' ')
    .replace(/\s+,/g, ',')
    .replace(/,\s*,/g, ',')
    .trim()
    .replace(/^,+|,+$/g, '')
    .trim()

const splitStreetLine = (address: string): [string, string] => {
  const comma = address.indexOf(',')
  return comma === -1 ? [address, ''] : [address.slice(0, comma), address.slice(comma)]
}

const rewriteStreetLine = (address: string, rewrite: (street: string) => string): string => {
  const [street, rest] = splitStreetLine(address)
  return collapseWhitespace(rewrite(street) + rest)
}

export const stripSuite = (address: string): string =>
  collapseWhitespace(address.replace(SUITE_PATTERN, ''))

export const expandAbbreviations = (address: string): string =>
  rewriteStreetLine(address, (street) =>
    EXPANSIONS.reduce((line, [pattern, expansion]) => line.replace(pattern, expansion), street)
  )

export const dropTrailingUnit = (address: string): string =>
  rewriteStreetLine(address, (street) => street.trim().replace(TRAILING_UNIT_PATTERN, '$1'))

export const dropZipCode = (address: string): string => {
  const [street, rest] = splitStreetLine(address)
  return collapseWhitespace(street + rest.replace(ZIP_PATTERN, ''))
}

export const appendCountry = (address: string, country: string): string =>
  address.toLowerCase().endsWith(country.toLowerCase()) ? address : `${address}, ${country}`

export interface VariationOptions {
  maxVariations: number
  countrySuffix?: string
}

/**
 * Ordered, de-duplicated queries for one address, starting with the address
 * itself
 */
export const createAddressVariations = (address: string, options: VariationOptions): string[] => {
  const original = collapseWhitespace(address)
  if (!original) {
    return []
  }

  const noSuite = stripSuite(original)
  const candidates = [
    original,
    noSuite,
    expandAbbreviations(original),
    expandAbbreviations(noSuite),
    dropTrailingUnit(noSuite),
    dropZipCode(noSuite)
  ]
  if (options.countrySuffix) {
    candidates.push(appendCountry(noSuite, options.countrySuffix))
  }

  const variations: string[] = []
  for (const candidate of candidates) {
    if (candidate && !variations.includes(candidate)) {
      variations.push(candidate)
    }
  }

  return variations.slice(0, Math.max(1, options.maxVariations))
}
