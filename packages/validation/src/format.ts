/**
 * Inserts `,` every three digits, counted from the right, into each run of
 * digits. Other characters pass through.
 *
 * @example insertThousandsSeparators('1234567 = 1000') // '1,234,567 = 1,000'
 */
export function insertThousandsSeparators(text: string): string {
  return text.replace(/\d+/g, (digits) => digits.replace(/\B(?=(\d{3})+(?!\d))/g, ','))
}
