import type DateString from '../@types/DateString.js'

const msPerDay = 24 * 60 * 60 * 1000

/** Returns the number of calendar days from a to b. Negative if b is before a. */
const daysBetween = (a: DateString, b: DateString): number =>
  Math.round((new Date(b).getTime() - new Date(a).getTime()) / msPerDay)

export default daysBetween
