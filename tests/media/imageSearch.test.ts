import { describe, it, expect, afterEach, vi } from "vitest";
import {
  buildSearchUrl,
  extractLinks,
  pickImageCandidates,
  searchImages,
} from "../../src/media/imageSearch";
import { mockFetchFailure, mockFetchRouter } from "../fixtures";

const CREDS = { apiKey: "test-google-key", cseId: "test-cse" };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildSearchUrl", () => {
  it("encodes the query and fixed image parameters", () => {
    expect(buildSearchUrl("pure functions", "k", "c")).toBe(
      "https://www.googleapis.com/customsearch/v1?key=k&cx=c&q=pure+functions&searchType=image&safe=active&num=10"
    );
  });

  it("passes the rights filter through", () => {
    const url = new URL(buildSearchUrl("q", "k", "c", "cc_publicdomain"));
    expect(url.searchParams.get("rights")).toBe("cc_publicdomain");
  });
});

describe("extractLinks", () => {
  it("keeps non-empty string links in order", () => {
    const body = { items: [{ link: "https://a.example/1.png" }, { link: "" }, { title: "x" }, { link: 3 }, { link: "https://b.example/2" }] };
    expect(extractLinks(body)).toEqual(["https://a.example/1.png", "https://b.example/2"]);
  });

  it("returns nothing for bodies without items", () => {
    expect(extractLinks({})).toEqual([]);
    expect(extractLinks(null)).toEqual([]);
    expect(extractLinks({ items: "nope" })).toEqual([]);
  });
});

describe("pickImageCandidates", () => {
  it("prefers links with image extensions", () => {
    expect(
      pickImageCandidates(["https://a.example/page", "https://b.example/pic.JPG", "https://c.example/pic.png"])
    ).toEqual(["https://b.example/pic.JPG", "https://c.example/pic.png"]);
  });

  it("falls back to every link when none match", () => {
    const links = ["https://a.example/page", "https://b.example/pic.webp"];
    expect(pickImageCandidates(links)).toEqual(links);
  });
});

describe("searchImages", () => {
  it("returns null without making a request when not configured", async () => {
    const requests = mockFetchRouter([]);
    vi.spyOn(console, "log").mockImplementation(() => {});

    expect(await searchImages("query", { apiKey: "test-google-key" })).toBeNull();
    expect(requests).toHaveLength(0);
  });

  it("returns ordered candidates from the API", async () => {
    const requests = mockFetchRouter([
      {
        match: /customsearch/,
        contentType: "application/json",
        body: JSON.stringify({
          items: [{ link: "https://a.example/page" }, { link: "https://b.example/one.jpeg" }],
        }),
      },
    ]);

    expect(await searchImages("clean code", CREDS)).toEqual(["https://b.example/one.jpeg"]);
    expect(requests).toHaveLength(1);
    expect(new URL(requests[0].url).searchParams.get("q")).toBe("clean code");
  });

  it("returns null on HTTP errors", async () => {
    mockFetchRouter([{ match: /customsearch/, status: 403, body: "{}" }]);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await searchImages("q", CREDS)).toBeNull();
    expect(warn).toHaveBeenCalledWith("[search] Failed to search images: search: HTTP 403");
  });

  it("returns null when there are no results", async () => {
    mockFetchRouter([{ match: /customsearch/, body: JSON.stringify({ items: [] }) }]);
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await searchImages("q", CREDS)).toBeNull();
  });

  it("returns null when the network fails", async () => {
    mockFetchFailure();
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(await searchImages("q", CREDS)).toBeNull();
  });
});
