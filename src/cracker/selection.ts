/**
 * Picks the most probable key(s) from an attack's score map.
 */

import type { KeyScoreMap } from '../types.ts'

/**
 * Every key whose score equals the maximum, in ascending order. Ties are all
 * reported. An empty map yields [] ("no viable key").
 */
export function findProbableKeys(scores: KeyScoreMap): number[] {
  let maxScore = 0
  let keys: number[] = []
  for (const [key, score] of scores) {
    if (score > maxScore) {
      maxScore = score
      keys = [key]
    } else if (score === maxScore) {
      keys.push(key)
    }
  }
  return keys.sort((a, b) => a - b)
}
