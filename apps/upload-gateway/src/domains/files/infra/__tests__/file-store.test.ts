import type { StoragePort } from "@filegate/storage"
import { type MockProxy, mock } from "vitest-mock-extended"
import { FileGatewayError } from "../../model/files.errors"
import { FileStore } from "../file-store"

describe("FileStore", () => {
  let objectStorage: MockProxy<StoragePort>
  let store: FileStore

  const ref = { bucket: "uploads", key: "/a/b.jpg" }
  const failure = new Error("connection reset")

  beforeEach(() => {
    objectStorage = mock<StoragePort>()
    store = new FileStore({ objectStorage }, { bucket: "uploads" })
  })

  async function caught(promise: Promise<unknown>): Promise<FileGatewayError> {
    const err = await promise.then(
      () => undefined,
      (e: unknown) => e,
    )
    if (!(err instanceof FileGatewayError)) throw new Error("expected a FileGatewayError")
    return err
  }

  it("checks its own bucket", async () => {
    objectStorage.bucketExists.mockResolvedValue(false)

    expect(await store.exists()).toBe(false)
    expect(objectStorage.bucketExists).toHaveBeenCalledWith("uploads")
  })

  it("lets a failing bucket check through as is", async () => {
    objectStorage.bucketExists.mockRejectedValue(failure)

    await expect(store.exists()).rejects.toBe(failure)
  })

  it("passes content headers and a known size to put", async () => {
    objectStorage.put.mockResolvedValue({ etag: '"e"' })
    const body = Buffer.from("abc")

    const result = await store.put("/a/b.jpg", body, {
      contentType: "image/jpeg",
      contentDisposition: "inline",
      sizeInBytes: 3,
    })

    expect(result).toEqual({ etag: '"e"' })
    expect(objectStorage.put).toHaveBeenCalledWith(ref, body, {
      contentType: "image/jpeg",
      contentDisposition: "inline",
      sizeInBytes: 3,
    })
  })

  it("omits an undeclared size", async () => {
    objectStorage.put.mockResolvedValue({})
    const body = Buffer.alloc(0)

    await store.put("/a/b.jpg", body, {
      contentType: "image/jpeg",
      contentDisposition: "inline",
      sizeInBytes: -1,
    })

    expect(objectStorage.put).toHaveBeenCalledWith(ref, body, {
      contentType: "image/jpeg",
      contentDisposition: "inline",
    })
  })

  it("wraps put failures as backend_error", async () => {
    objectStorage.put.mockRejectedValue(failure)

    const err = await caught(
      store.put("/a/b.jpg", Buffer.from("x"), {
        contentType: "image/jpeg",
        contentDisposition: "inline",
        sizeInBytes: 1,
      }),
    )

    expect(err.code).toBe("backend_error")
    expect(err.cause).toBe(failure)
    expect(err.context).toEqual({ key: "/a/b.jpg" })
  })

  it("wraps head failures as storage_error", async () => {
    objectStorage.head.mockRejectedValue(failure)

    const err = await caught(store.head("/a/b.jpg"))

    expect(err.code).toBe("storage_error")
    expect(err.cause).toBe(failure)
  })

  it("wraps get failures as storage_error", async () => {
    objectStorage.get.mockRejectedValue(failure)

    const err = await caught(store.get("/a/b.jpg"))

    expect(err.code).toBe("storage_error")
    expect(err.cause).toBe(failure)
  })

  it("wraps presign failures as storage_error", async () => {
    objectStorage.getPresignedDownloadUrl.mockRejectedValue(failure)

    const err = await caught(
      store.presign("/a/b.jpg", 60, {
        responseContentType: "image/jpeg",
        responseContentDisposition: "inline",
      }),
    )

    expect(err.code).toBe("storage_error")
    expect(err.cause).toBe(failure)
  })

  it("forwards the range to get", async () => {
    objectStorage.get.mockResolvedValue(null)

    expect(await store.get("/a/b.jpg", { range: { start: 1, end: 2 } })).toBeNull()
    expect(objectStorage.get).toHaveBeenCalledWith(ref, { range: { start: 1, end: 2 } })
  })

  it("presigns with the lifetime and response overrides", async () => {
    const url = new URL("https://s3.example.test/uploads/a/b.jpg?X-Amz-Signature=sig")
    objectStorage.getPresignedDownloadUrl.mockResolvedValue(url)

    const result = await store.presign("/a/b.jpg", 86_400, {
      responseContentType: "image/jpeg",
      responseContentDisposition: "inline",
    })

    expect(result).toBe(url)
    expect(objectStorage.getPresignedDownloadUrl).toHaveBeenCalledWith(ref, {
      expiresInSeconds: 86_400,
      responseContentType: "image/jpeg",
      responseContentDisposition: "inline",
    })
  })
})
