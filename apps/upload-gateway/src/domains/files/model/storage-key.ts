/**
 * Strips exactly `/<uploadSubDir>` from a request path, as configured. With
 * `upload` the key of `/upload/a/b.jpg` is `/a/b.jpg`; with `upload/` it is
 * `a/b.jpg`. Clients sign whichever string results.
 *
 * Nothing else is normalized; `..` segments that reach this point are kept.
 */
export function storageKeyFromPath(path: string, uploadSubDir: string): string {
  const prefix = `/${uploadSubDir}`

  return path.startsWith(prefix) ? path.slice(prefix.length) : path
}
