import { getMimeType } from "hono/utils/mime"

export type ContentDisposition = "inline" | "attachment"

export type ContentMetadata = {
  contentType: string
  disposition: ContentDisposition
}

const FALLBACK_CONTENT_TYPE = "application/octet-stream"
const INLINE_TYPES = /^(?:(?:audio|image|video)\/|text\/plain(?:$|;))/

/** Type and disposition follow from the key's extension alone. */
export function contentMetadataFor(key: string): ContentMetadata {
  const contentType = getMimeType(key.toLowerCase()) ?? FALLBACK_CONTENT_TYPE

  return {
    contentType,
    disposition: INLINE_TYPES.test(contentType) ? "inline" : "attachment",
  }
}
