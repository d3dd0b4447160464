export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type HttpRequest = {
  method: HttpMethod;
  path: string;
  pathParams: Record<string, string>;
  query: Record<string, string | string[]>;
  headers: Record<string, string | string[]>;
  body: string | null;
  requestId: string;
};

export type HttpResponse = {
  status: number;
  headers: Record<string, string>;
  body?: string;
};
