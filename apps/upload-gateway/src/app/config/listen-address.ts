export type ListenAddress = {
  host: string
  port: number
}

const DEFAULT_HOST = "0.0.0.0"

export class ListenAddressError extends Error {
  constructor(readonly input: string) {
    super(`Invalid listen address "${input}", expected host:port, :port or port`)
    this.name = "ListenAddressError"
  }
}

/**
 * Parses `listenport` values: `"5050"`, `":5050"`, `"127.0.0.1:5050"`,
 * `"[::]:5050"`. An empty host binds every interface.
 */
export function parseListenAddress(input: string): ListenAddress {
  const value = input.trim()
  const separator = value.lastIndexOf(":")

  const rawHost = separator === -1 ? "" : value.slice(0, separator)
  const rawPort = separator === -1 ? value : value.slice(separator + 1)

  if (!/^\d{1,5}$/.test(rawPort)) throw new ListenAddressError(input)

  const port = Number(rawPort)
  if (port > 65_535) throw new ListenAddressError(input)

  const host = rawHost.startsWith("[") && rawHost.endsWith("]")
    ? rawHost.slice(1, -1)
    : rawHost

  if (host.includes("[") || host.includes("]")) throw new ListenAddressError(input)

  return { host: host === "" ? DEFAULT_HOST : host, port }
}
