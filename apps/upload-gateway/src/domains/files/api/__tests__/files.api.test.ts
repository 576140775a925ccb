import type { Application } from "@filegate/server"
import {
  createTestHarness,
  TRAILING_SLASH_CONFIG,
  type TestHarness,
} from "../../../../tests/test-harness"
import { signUpload } from "../../model/upload-signature"

describe("Files API", () => {
  const secret = "test-secret"
  const key = "/thomas/abc/catmetal.jpg"
  const path = `/upload${key}`
  const content = "cat pixels!"
  const etag = '"312ea2c7a0a3e27b7d69af8826b9b29a"'

  type ErrorBody = {
    error: { status: number; code: string; message: string; requestId: string }
  }

  const isErrorBody = (value: unknown): value is ErrorBody =>
    typeof value === "object" && value !== null && "error" in value

  const errorOf = async (res: Response): Promise<ErrorBody["error"]> => {
    const body: unknown = await res.json()
    if (!isErrorBody(body)) throw new Error("response carries no error envelope")
    return body.error
  }

  const put = (app: Application, target: string, body: string, v?: string, length?: number) => {
    const query = v === undefined ? "" : `?v=${v}`

    return app.request(`${target}${query}`, {
      method: "PUT",
      body,
      headers: {
        "Content-Type": "image/jpeg",
        "Content-Length": String(length ?? Buffer.byteLength(body)),
      },
    })
  }

  const upload = (app: Application) =>
    put(app, path, content, signUpload(secret, key, content.length))

  describe("in proxy mode", () => {
    let harness: TestHarness
    let app: Application

    beforeEach(async () => {
      harness = await createTestHarness()
      app = harness.app
    })

    afterEach(async () => {
      await harness.lifecycle.stop()
    })

    it("stores a signed upload and answers 201 with an empty body", async () => {
      const res = await upload(app)

      expect(res.status).toBe(201)
      expect(await res.text()).toBe("")

      const stored = await harness.objectStorage.head({ bucket: "uploads", key })
      expect(stored?.sizeInBytes).toBe(11)
      expect(stored?.contentType).toBe("image/jpeg")
      expect(stored?.contentDisposition).toBe("inline")
    })

    it("serves the uploaded bytes back", async () => {
      await upload(app)

      const res = await app.request(path)

      expect(res.status).toBe(200)
      expect(res.headers.get("content-type")).toBe("image/jpeg")
      expect(res.headers.get("content-disposition")).toBe("inline")
      expect(res.headers.get("content-length")).toBe("11")
      expect(res.headers.get("etag")).toBe(etag)
      expect(res.headers.get("last-modified")).toBe("Wed, 01 May 2024 10:00:00 GMT")
      expect(res.headers.get("accept-ranges")).toBe("bytes")
      expect(await res.text()).toBe(content)
    })

    it("answers HEAD with headers only", async () => {
      await upload(app)
      const getSpy = vi.spyOn(harness.objectStorage, "get")

      const res = await app.request(path, { method: "HEAD" })

      expect(res.status).toBe(200)
      expect(res.headers.get("content-type")).toBe("image/jpeg")
      expect(res.headers.get("content-length")).toBe("11")
      expect(await res.text()).toBe("")
      expect(getSpy).not.toHaveBeenCalled()
    })

    it("serves byte ranges", async () => {
      await upload(app)

      const res = await app.request(path, { headers: { Range: "bytes=0-2" } })

      expect(res.status).toBe(206)
      expect(res.headers.get("content-range")).toBe("bytes 0-2/11")
      expect(await res.text()).toBe("cat")
    })

    it("answers 416 for an unsatisfiable range", async () => {
      await upload(app)

      const res = await app.request(path, { headers: { Range: "bytes=50-" } })

      expect(res.status).toBe(416)
      expect(res.headers.get("content-range")).toBe("bytes */11")
    })

    it("answers 304 for a matching If-None-Match", async () => {
      await upload(app)

      const res = await app.request(path, { headers: { "If-None-Match": etag } })

      expect(res.status).toBe(304)
      expect(await res.text()).toBe("")
    })

    it("answers HEAD with 304 like GET for a matching If-None-Match", async () => {
      await upload(app)

      const res = await app.request(path, { method: "HEAD", headers: { "If-None-Match": etag } })

      expect(res.status).toBe(304)
      expect(res.headers.get("etag")).toBe(etag)
    })

    it("answers 412 for a failing If-Match", async () => {
      await upload(app)

      const res = await app.request(path, { headers: { "If-Match": '"stale"' } })

      expect(res.status).toBe(412)
    })

    it("answers 502 Storage error for a missing object", async () => {
      const res = await app.request("/upload/nobody/here.jpg")

      expect(res.status).toBe(502)
      expect(await errorOf(res)).toEqual({
        status: 502,
        code: "storage_error",
        message: "Storage error",
        requestId: expect.any(String),
      })
    })

    it("answers 502 Storage error when the backend fails", async () => {
      vi.spyOn(harness.objectStorage, "head").mockRejectedValue(new Error("connection reset"))

      const res = await app.request(path)

      expect(res.status).toBe(502)
      expect(await errorOf(res)).toMatchObject({
        code: "storage_error",
        message: "Storage error",
      })
    })

    it("rejects an upload without a signature", async () => {
      const res = await put(app, path, content)

      expect(res.status).toBe(403)
      expect(await errorOf(res)).toMatchObject({
        code: "signature_missing",
        message: "Needs HMAC",
      })
      expect(await harness.objectStorage.head({ bucket: "uploads", key })).toBeNull()
    })

    it("rejects an upload with a wrong signature", async () => {
      const res = await put(app, path, content, signUpload(secret, key, 12))

      expect(res.status).toBe(403)
      expect(await errorOf(res)).toMatchObject({
        code: "signature_mismatch",
        message: "403 Forbidden",
      })
      expect(await harness.objectStorage.head({ bucket: "uploads", key })).toBeNull()
    })

    it("rejects an empty signature as a mismatch", async () => {
      const res = await put(app, path, content, "")

      expect((await errorOf(res)).code).toBe("signature_mismatch")
    })

    it("ignores a malformed query string", async () => {
      const res = await put(app, path, content, "%zz")

      expect(res.status).toBe(403)
      expect((await errorOf(res)).code).toBe("signature_missing")
    })

    it("answers 502 Backend Error when storing fails", async () => {
      // Declared and signed as 5 bytes, sends 11.
      const res = await put(app, path, content, signUpload(secret, key, 5), 5)

      expect(res.status).toBe(502)
      expect(await errorOf(res)).toMatchObject({
        code: "backend_error",
        message: "Backend Error",
      })
    })

    it("signs over the decoded path", async () => {
      const res = await put(
        app,
        "/upload/a/my%20file.txt",
        "hello",
        signUpload(secret, "/a/my file.txt", 5),
      )

      expect(res.status).toBe(201)
      expect(
        await harness.objectStorage.head({ bucket: "uploads", key: "/a/my file.txt" }),
      ).not.toBeNull()
    })

    it("answers OPTIONS with the allowed methods", async () => {
      const res = await app.request(path, { method: "OPTIONS" })

      expect(res.status).toBe(200)
      expect(res.headers.get("allow")).toBe("OPTIONS, HEAD, GET, PUT")
      expect(await res.text()).toBe("")
    })

    it.each(["POST", "DELETE", "PATCH"])("answers %s with 405", async (method) => {
      const res = await app.request(path, { method })

      expect(res.status).toBe(405)
      expect(await errorOf(res)).toMatchObject({
        code: "method_not_allowed",
        message: "405 Method Not Allowed",
      })
    })

    it("sets CORS headers on success and on errors", async () => {
      const ok = await app.request(path, { method: "OPTIONS" })
      const denied = await put(app, path, content)

      for (const res of [ok, denied]) {
        expect(res.headers.get("access-control-allow-origin")).toBe("*")
        expect(res.headers.get("access-control-allow-methods")).toBe("OPTIONS, HEAD, GET, PUT")
        expect(res.headers.get("access-control-allow-headers")).toBe(
          "Authorization, Content-Type",
        )
        expect(res.headers.get("access-control-allow-credentials")).toBe("true")
        expect(res.headers.get("access-control-max-age")).toBe("7200")
      }
    })

    it("does not serve anything outside the mount", async () => {
      expect((await app.request("/")).status).toBe(404)
      expect((await app.request("/elsewhere/catmetal.jpg")).status).toBe(404)
    })

    it("resolves dot segments before routing", async () => {
      const res = await app.request("/upload/../catmetal.jpg")

      expect(res.status).toBe(404)
      expect(res.headers.get("access-control-allow-origin")).toBe("*")
    })

    it("exposes liveness", async () => {
      const res = await app.request("/health")

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ ok: true })
    })
  })

  describe("in redirect mode", () => {
    let harness: TestHarness
    let app: Application

    beforeEach(async () => {
      harness = await createTestHarness({ files: { proxyMode: false } })
      app = harness.app
    })

    afterEach(async () => {
      await harness.lifecycle.stop()
    })

    it("redirects GET to a presigned URL", async () => {
      await upload(app)

      const res = await app.request(path)

      expect(res.status).toBe(302)

      const location = new URL(res.headers.get("location") ?? "")
      expect(location.host).toBe("uploads")
      expect(location.pathname).toBe("//thomas/abc/catmetal.jpg")
      expect(location.searchParams.get("expires")).toBe("86400")
      expect(location.searchParams.get("response-content-type")).toBe("image/jpeg")
      expect(location.searchParams.get("response-content-disposition")).toBe("inline")
    })

    it("redirects HEAD as well", async () => {
      const res = await app.request(path, { method: "HEAD" })

      expect(res.status).toBe(302)
      expect(res.headers.get("location")).toMatch(/^memory:\/\/uploads\//)
    })

    it("answers 502 Storage error when signing fails", async () => {
      vi.spyOn(harness.objectStorage, "getPresignedDownloadUrl").mockRejectedValue(
        new Error("no credentials"),
      )

      const res = await app.request(path)

      expect(res.status).toBe(502)
      expect((await errorOf(res)).message).toBe("Storage error")
    })
  })

  describe("with a nested mount", () => {
    it("strips the whole prefix from the key", async () => {
      const harness = await createTestHarness({ files: { uploadSubDir: "xmpp/files" } })

      const res = await put(
        harness.app,
        "/xmpp/files/a.txt",
        "hello",
        signUpload(secret, "/a.txt", 5),
      )

      expect(res.status).toBe(201)
      expect(
        await harness.objectStorage.head({ bucket: "uploads", key: "/a.txt" }),
      ).not.toBeNull()
    })
  })

  describe("with a trailing slash on the configured prefix", () => {
    let harness: TestHarness

    beforeEach(async () => {
      harness = await createTestHarness({ configFile: TRAILING_SLASH_CONFIG })
    })

    it("keeps the prefix as configured", () => {
      expect(harness.ctx.config.files.uploadSubDir).toBe("upload/")
    })

    it("accepts a signature over the key without a leading slash", async () => {
      const signature = "2a15ec751c8ecae8538c9dcbdec2c02c7aa9cbdf8b7d23a56a73152bb1ca610a"

      const res = await put(harness.app, "/upload/a/b.jpg", "hello", signature)

      expect(res.status).toBe(201)
      expect(
        await harness.objectStorage.head({ bucket: "uploads", key: "a/b.jpg" }),
      ).not.toBeNull()
    })

    it("rejects a signature over the slash-prefixed key", async () => {
      const signature = signUpload(secret, "/a/b.jpg", 5)

      const res = await put(harness.app, "/upload/a/b.jpg", "hello", signature)

      expect(res.status).toBe(403)
    })

    it("serves the stored file under the same path", async () => {
      await put(harness.app, "/upload/a/b.jpg", "hello", signUpload(secret, "a/b.jpg", 5))

      const res = await harness.app.request("/upload/a/b.jpg")

      expect(res.status).toBe(200)
      expect(await res.text()).toBe("hello")
    })
  })
})
