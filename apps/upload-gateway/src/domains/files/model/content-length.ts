/** `-1` stands for "not declared", as for a chunked request body. */
export const UNKNOWN_LENGTH = -1

export function parseContentLength(header: string | undefined): number {
  if (header === undefined || !/^\d+$/.test(header.trim())) return UNKNOWN_LENGTH

  const length = Number(header.trim())

  return Number.isSafeInteger(length) ? length : UNKNOWN_LENGTH
}
