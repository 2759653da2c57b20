import { formatPhone } from './phone'

describe('formatPhone', () => {
  it('should format ten-digit numbers', () => {
    expect(formatPhone('6125550100')).toBe('(612) 555-0100')
    expect(formatPhone('612.555.0100')).toBe('(612) 555-0100')
  })

  it('should drop a leading country code', () => {
    expect(formatPhone('+1 (612) 555-0100')).toBe('(612) 555-0100')
  })

  it('should use the first ten digits of longer numbers', () => {
    expect(formatPhone('612-555-0100 x12')).toBe('(612) 555-0100')
  })

  it('should return short numbers trimmed', () => {
    expect(formatPhone(' 555-0100 ')).toBe('555-0100')
  })

  it('should show N/A for missing numbers', () => {
    expect(formatPhone()).toBe('N/A')
    expect(formatPhone('   ')).toBe('N/A')
  })
})
