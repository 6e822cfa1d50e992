/**
 * Parse an ISO 8601 duration ("PT1H30M", "P0DT45M") to minutes.
 * Returns null when the input is empty, unparseable or zero.
 */
export function parseIsoDuration(duration: unknown): number | null {
  if (typeof duration !== 'string' || !duration) return null

  const match = duration.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/)
  if (!match) return null

  const [, days = '0', hours = '0', minutes = '0', seconds = '0'] = match
  const total =
    parseInt(days, 10) * 24 * 60 + parseInt(hours, 10) * 60 + parseInt(minutes, 10) + Math.round(parseInt(seconds, 10) / 60)
  return total > 0 ? total : null
}

/**
 * Parse informal durations ("1 hr 30 min", "45 minutes", "1.5 hours", "90")
 * to minutes. Returns null if nothing recognisable is found.
 */
export function parseInformalDuration(text: string | null | undefined): number | null {
  if (!text || !text.trim()) return null
  const input = text.trim().toLowerCase()

  const iso = parseIsoDuration(text.trim().toUpperCase())
  if (iso !== null) return iso

  let total = 0
  let matched = false

  const hours = input.match(/(\d+(?:[.,]\d+)?)\s*(?:hours?|hrs?|h|ore|ora)\b/)
  if (hours) {
    total += parseFloat(hours[1].replace(',', '.')) * 60
    matched = true
  }

  const minutes = input.match(/(\d+(?:[.,]\d+)?)\s*(?:minutes?|mins?|m|minuti)\b/)
  if (minutes) {
    total += parseFloat(minutes[1].replace(',', '.'))
    matched = true
  }

  if (!matched && /^\d+$/.test(input)) {
    total = parseInt(input, 10)
    matched = true
  }

  return matched && total > 0 ? Math.round(total) : null
}
