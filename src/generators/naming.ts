/**
 * Shared Naming Utilities for Model Generation
 *
 * Single source of truth for turning catalog identifiers (snake_case,
 * kebab-case) into Java class and field names.
 *
 * Title-casing follows word boundaries rather than separators alone: a letter
 * that follows any non-letter starts a new word.
 *
 * normalize("order_line_item", false) // => "OrderLineItem"
 * normalize("address2line", false)    // => "Address2Line"
 */

/** Runs of separators removed between segments */
const SEPARATOR_RUN = /[_\-\s]+/

const LETTER = /\p{L}/u

/**
 * Title-case a single segment: a letter following a non-letter (or at the
 * start) is upper-cased, every other letter lower-cased, anything else
 * passes through.
 */
export function titleCase(segment: string): string {
  let result = ''
  let previousWasLetter = false

  for (const char of segment) {
    if (LETTER.test(char)) {
      result += previousWasLetter ? char.toLowerCase() : char.toUpperCase()
      previousWasLetter = true
    } else {
      result += char
      previousWasLetter = false
    }
  }

  return result
}

/**
 * Convert a catalog identifier to PascalCase, or camelCase when `startLower`
 * is set (only the first character is lowered).
 *
 * @example
 * normalize("user_id", true)  // => "userId"
 * normalize("user_id", false) // => "UserId"
 * normalize("order-line-item", false) // => "OrderLineItem"
 */
export function normalize(name: string, startLower: boolean): string {
  const joined = name.split(SEPARATOR_RUN).map(titleCase).join('')

  if (!startLower || joined.length === 0) {
    return joined
  }

  const [first, ...rest] = joined
  return first.toLowerCase() + rest.join('')
}

/**
 * @example
 * toPascalCase("order_items") // => "OrderItems"
 */
export function toPascalCase(name: string): string {
  return normalize(name, false)
}

/**
 * @example
 * toCamelCase("unit_price") // => "unitPrice"
 */
export function toCamelCase(name: string): string {
  return normalize(name, true)
}
