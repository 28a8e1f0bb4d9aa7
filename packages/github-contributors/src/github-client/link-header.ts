export class LinkHeaderParseError extends Error {
  constructor(
    message: string,
    readonly header: string
  ) {
    super(message);
    this.name = "LinkHeaderParseError";
  }
}

/**
 * Parse a `Link` response header into a map of relation name to URL.
 *
 * @example
 * parseLinkHeader('<https://api.github.com/x?page=2>; rel="next"')
 * // => { next: "https://api.github.com/x?page=2" }
 */
export function parseLinkHeader(header: string): Record<string, string> {
  const links: Record<string, string> = {};

  for (const part of header.split(",")) {
    const [target, ...params] = part.split(";");
    const rel = params
      .map((param) => param.trim())
      .find((param) => param.startsWith("rel="));

    if (rel === undefined) {
      throw new LinkHeaderParseError(
        `Link segment has no rel parameter: "${part.trim()}"`,
        header
      );
    }

    const url = target.trim().replace(/^<|>$/g, "");
    const name = rel.slice("rel=".length).replace(/^"|"$/g, "");
    links[name] = url;
  }

  return links;
}
