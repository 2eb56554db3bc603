import type DateString from '../@types/DateString.js'

/** Comparator for chronological order of yyyy-mm-dd dates. Combined with a stable sort, equal dates keep their input order. */
const byDate = (a: { date: DateString }, b: { date: DateString }): number =>
  a.date < b.date ? -1 : a.date > b.date ? 1 : 0

export default byDate
