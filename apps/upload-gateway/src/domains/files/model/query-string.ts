/**
 * Parses a raw query string, or returns `undefined` when a component is not
 * valid percent-encoding. `URLSearchParams` alone would accept it silently.
 */
export function parseQueryString(search: string): URLSearchParams | undefined {
  const query = search.startsWith("?") ? search.slice(1) : search

  for (const part of query.split("&")) {
    if (!isDecodable(part.replace(/\+/g, " "))) return undefined
  }

  return new URLSearchParams(query)
}

function isDecodable(component: string): boolean {
  try {
    decodeURIComponent(component)
    return true
  } catch {
    return false
  }
}
