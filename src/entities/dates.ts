/**
 * Calendar dates stored as DDMMYYYY integers (25102025 is 25 Oct 2025).
 */

import { ValidationError } from '../record-store/errors'

export interface CalendarDate {
  day: number
  month: number
  year: number
}

const msPerDay = 86_400_000
const maxEncodedDate = 99_999_999

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

function fromDigits(digits: string): CalendarDate | null {
  const day = Number(digits.slice(0, 2))
  const month = Number(digits.slice(2, 4))
  const year = Number(digits.slice(4, 8))

  if (year < 1 || month < 1 || month > 12) {
    return null
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null
  }
  return { day, month, year }
}

/**
 * Decode a stored DDMMYYYY integer; null when it is not a real date.
 */
export function decodeDate(value: number): CalendarDate | null {
  if (!Number.isInteger(value) || value < 0 || value > maxEncodedDate) {
    return null
  }
  return fromDigits(String(value).padStart(8, '0'))
}

export function encodeDate(date: CalendarDate): number {
  return date.day * 1_000_000 + date.month * 10_000 + date.year
}

/**
 * Validate user input and return it as a DDMMYYYY integer.
 * Strings must be exactly 8 digits; integers are zero padded to 8.
 */
export function parseDate(input: string | number, field = 'date'): number {
  let digits: string
  if (typeof input === 'number') {
    if (!Number.isInteger(input) || input < 0 || input > maxEncodedDate) {
      throw new ValidationError(
        `${field} must be a DDMMYYYY date, got ${input}`,
        field
      )
    }
    digits = String(input).padStart(8, '0')
  } else {
    digits = input.trim()
    if (!/^\d{8}$/.test(digits)) {
      throw new ValidationError(
        `${field} must be 8 digits (DDMMYYYY), got "${input}"`,
        field
      )
    }
  }

  const date = fromDigits(digits)
  if (!date) {
    throw new ValidationError(`${field} is not a calendar date: ${digits}`, field)
  }
  return encodeDate(date)
}

/**
 * Days since 1970-01-01 (UTC).
 */
export function toEpochDay(date: CalendarDate): number {
  const value = new Date(0)
  value.setUTCFullYear(date.year, date.month - 1, date.day)
  return Math.round(value.getTime() / msPerDay)
}

/**
 * Rental length counting both the first and last day.
 * Null when either date is malformed or the end precedes the start.
 */
export function rentalDays(startDate: number, endDate: number): number | null {
  const start = decodeDate(startDate)
  const end = decodeDate(endDate)
  if (!start || !end) {
    return null
  }

  const days = toEpochDay(end) - toEpochDay(start) + 1
  return days > 0 ? days : null
}

/**
 * DD-MM-YYYY, or "Invalid" for a value that is not a date.
 */
export function formatDate(value: number): string {
  const date = decodeDate(value)
  if (!date) {
    return 'Invalid'
  }
  const pad = (n: number, width: number) => String(n).padStart(width, '0')
  return `${pad(date.day, 2)}-${pad(date.month, 2)}-${pad(date.year, 4)}`
}
