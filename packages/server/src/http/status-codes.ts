export type ClientErrorStatusCode =
  | 400
  | 401
  | 403
  | 404
  | 405
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 415
  | 416
  | 422
  | 429

export type ServerErrorStatusCode = 500 | 501 | 502 | 503 | 504

/** Statuses an error response can carry. */
export type StatusCode = ClientErrorStatusCode | ServerErrorStatusCode
