import { describe, it, expect } from "vitest";
import { GitHubClient } from "../src/server/clients/GitHubClient.js";
import { RateLimitGuard } from "../src/server/services/infrastructure/RateLimitGuard.js";
import { TemplateFetcher } from "../src/server/services/templates/TemplateFetcher.js";
import { TemplateFetchError } from "../src/server/types/errors.js";
import { API, FakeClock, FakeGitHub } from "./helpers/fakeGitHub.js";

function setup() {
  const clock = new FakeClock();
  const github = new FakeGitHub(clock);
  const client = new GitHubClient({
    guard: new RateLimitGuard({ clock, sleep: clock.sleep }),
    http: github.http(),
    sleep: clock.sleep,
  });
  return { github, fetcher: new TemplateFetcher(client) };
}

describe("TemplateFetcher", () => {
  it("returns raw download bodies as text", async () => {
    const { github, fetcher } = setup();
    github.on("https://raw.example/web/main.bicep", { body: "param location string\n" });

    const content = await fetcher.fetchContent({
      path: "web/main.bicep",
      rawRef: "https://raw.example/web/main.bicep",
      isDirectory: false,
    });

    expect(content).toBe("param location string\n");
  });

  it("decodes base64 blob payloads", async () => {
    const { github, fetcher } = setup();
    const blobUrl = `${API}/repos/Org/Repo/git/blobs/3f2a`;
    const text = '{"resources":[]}';
    // GitHub splits base64 content over several lines
    const encoded = Buffer.from(text).toString("base64").replace(/(.{8})/g, "$1\n");
    github.json(blobUrl, { sha: "3f2a", content: encoded, encoding: "base64" });

    await expect(fetcher.fetchContent({ path: "web/main.json", rawRef: blobUrl, isDirectory: false })).resolves.toBe(
      text,
    );
  });

  it("fails for an entry without a download locator", async () => {
    const { github, fetcher } = setup();
    await expect(fetcher.fetchContent({ path: "web/main.json", rawRef: "", isDirectory: false })).rejects.toBeInstanceOf(
      TemplateFetchError,
    );
    expect(github.requests).toEqual([]);
  });

  it("fails on a non-2xx status", async () => {
    const { fetcher } = setup();
    const error = await fetcher
      .fetchContent({ path: "web/main.json", rawRef: "https://raw.example/gone.json", isDirectory: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TemplateFetchError);
    expect(error instanceof TemplateFetchError && error.context).toEqual({
      path: "web/main.json",
      status: 404,
      url: "https://raw.example/gone.json",
    });
  });
});
