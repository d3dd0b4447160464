import { BadRequestException } from "./errors";

/**
 * Joins a route prefix with a route path. Both use the `{param}` format.
 *
 * @example
 * joinHandlerPath("/orders", "/{orderId}") => "/orders/{orderId}"
 * joinHandlerPath("/", "/health") => "/health"
 */
export function joinHandlerPath(prefix: string, routePath: string): string {
  const base = prefix || "";
  return `/${base}/${routePath}`.replaceAll(/\/+/g, "/").replace(/\/$/, "") || "/";
}

/**
 * Matches a request path against a `{param}` pattern and returns the decoded
 * path parameters, or `null` when the path does not match.
 *
 * @example
 * matchRoute("/orders/{orderId}", "/orders/42") => { orderId: "42" }
 */
export function matchRoute(pattern: string, actual: string): Record<string, string> | null {
  const patternParts = pattern.split("/").filter(Boolean);
  const actualParts = actual.split("/").filter(Boolean);
  if (patternParts.length !== actualParts.length) return null;

  const params: Record<string, string> = {};
  for (const [i, part] of patternParts.entries()) {
    const segment = actualParts[i] ?? "";
    if (part.startsWith("{") && part.endsWith("}")) {
      params[part.slice(1, -1)] = decodeSegment(segment);
    } else if (part !== segment) {
      return null;
    }
  }
  return params;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new BadRequestException(`Malformed path segment "${segment}"`);
    }
    throw error;
  }
}
