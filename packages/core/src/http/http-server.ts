export interface UploadedFile {
  buffer: Buffer;
  fieldname: string;
  originalname?: string;
  mimetype: string;
  size: number;
}

export interface RequestLike {
  params?: unknown;
  query?: unknown;
  body?: unknown;
  headers?: Record<string, string | string[] | undefined>;
  // Present when a multipart upload was parsed upstream (memory storage)
  file?: UploadedFile;
}

export interface ResponseLike {
  status(code: number): ResponseLike;
  json(payload: unknown): void;
  html(markup: string): void;
  text(body: string): void;
  header(name: string, value: string | string[]): ResponseLike;
  redirect(url: string, status?: number): void;
}

export type HttpHandler = (req: RequestLike, res: ResponseLike) => Promise<void> | void;

export interface HttpServer {
  get(path: string, handler: HttpHandler): void;
  post(path: string, handler: HttpHandler): void;
  delete(path: string, handler: HttpHandler): void;
  listen(port: number): Promise<void>;
}

export function headerValue(req: RequestLike, name: string): string | undefined {
  const v = req.headers?.[name.toLowerCase()];
  return Array.isArray(v) ? v[0] : v;
}

export function wantsJson(req: RequestLike): boolean {
  return (headerValue(req, "accept") ?? "").includes("application/json");
}
