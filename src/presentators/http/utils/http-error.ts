export class HttpError extends Error {
  status: number;
  code?: string;

  constructor(status: number, message: string, code?: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    if (code) this.code = code;
  }
}

export function badRequest(message: string): HttpError {
  return new HttpError(400, message, "invalid_request");
}
