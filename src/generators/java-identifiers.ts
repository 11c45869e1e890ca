/**
 * Java identifier rules
 *
 * Generated class, field and package names must be accepted by javac.
 * The reserved-word list lives in data/java-reserved-words.json.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'

const IDENTIFIER_PATTERN = /^[\p{L}_$][\p{L}\p{N}_$]*$/u

let reservedWords: ReadonlySet<string> | undefined

export function getReservedWords(): ReadonlySet<string> {
  if (!reservedWords) {
    const file = new URL('../../data/java-reserved-words.json', import.meta.url)
    const words = z.array(z.string()).parse(JSON.parse(readFileSync(file, 'utf8')))
    reservedWords = new Set(words)
  }
  return reservedWords
}

/**
 * Explain why `name` is not a legal Java identifier, or return null when it is
 *
 * @example
 * identifierProblem("unitPrice") // => null
 * identifierProblem("2faCode")   // => "is not a valid Java identifier"
 * identifierProblem("class")     // => "is a reserved Java word"
 */
export function identifierProblem(name: string): string | null {
  if (name.length === 0) {
    return 'is empty'
  }
  if (!IDENTIFIER_PATTERN.test(name)) {
    return 'is not a valid Java identifier'
  }
  if (getReservedWords().has(name)) {
    return 'is a reserved Java word'
  }
  return null
}

/**
 * Explain why `packageName` is not a legal dotted Java package name, or
 * return null when it is
 */
export function packageNameProblem(packageName: string): string | null {
  for (const segment of packageName.split('.')) {
    const problem = identifierProblem(segment)
    if (problem) {
      return `segment '${segment}' ${problem}`
    }
  }
  return null
}
