import { describe, it, expect } from "vitest";
import {
  LinkHeaderParseError,
  parseLinkHeader,
} from "../src/github-client/link-header";

describe("parseLinkHeader", () => {
  it("maps each relation to its URL", () => {
    const header =
      '<https://api.github.com/repositories/42/commits?since=2024-01-01T00%3A00%3A00Z&per_page=100&page=2>; rel="next", ' +
      '<https://api.github.com/repositories/42/commits?since=2024-01-01T00%3A00%3A00Z&per_page=100&page=7>; rel="last"';

    expect(parseLinkHeader(header)).toEqual({
      next: "https://api.github.com/repositories/42/commits?since=2024-01-01T00%3A00%3A00Z&per_page=100&page=2",
      last: "https://api.github.com/repositories/42/commits?since=2024-01-01T00%3A00%3A00Z&per_page=100&page=7",
    });
  });

  it("has no next relation on the last page", () => {
    const links = parseLinkHeader(
      '<https://api.github.com/repositories/42/commits?page=1>; rel="first", <https://api.github.com/repositories/42/commits?page=6>; rel="prev"'
    );

    expect(links.next).toBeUndefined();
    expect(links.prev).toBe("https://api.github.com/repositories/42/commits?page=6");
  });

  it("rejects a segment without parameters", () => {
    expect(() => parseLinkHeader("<https://api.github.com/x?page=2>")).toThrow(
      LinkHeaderParseError
    );
  });

  it("rejects a segment without a rel parameter", () => {
    expect(() =>
      parseLinkHeader('<https://api.github.com/x?page=2>; title="next"')
    ).toThrow('Link segment has no rel parameter: "<https://api.github.com/x?page=2>; title="next""');
  });
});
