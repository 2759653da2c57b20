/**
 * US display format for phone numbers: "(612) 555-0100". A leading country
 * code 1 on an eleven-digit number is dropped. Values with fewer than ten
 * digits are returned trimmed, and missing values become "N/A".
 */
export const formatPhone = (phone?: string): string => {
  const trimmed = phone?.trim()
  if (!trimmed) {
    return 'N/A'
  }

  let digits = trimmed.replace(/\D/g, '')
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1)
  }

  if (digits.length >= 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6, 10)}`
  }
  return trimmed
}
