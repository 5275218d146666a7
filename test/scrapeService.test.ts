import { describe, it, expect } from "vitest";
import {
  ArchitectureScrapeService,
  classifyScrapeError,
  type ContentFetcher,
} from "../src/server/services/scraping/ArchitectureScrapeService.js";
import { createScrapePipeline, type PipelineEnv } from "../src/server/services/scraping/scrapePipelineFactory.js";
import { InMemoryArchitectureSink } from "../src/server/services/infrastructure/InMemoryArchitectureSink.js";
import { formatSourceSpec } from "../src/server/services/templates/sourceSpec.js";
import type {
  SourceListing,
  TraversalKind,
  TreeTraversalStrategy,
} from "../src/server/services/traversal/TreeTraversalStrategy.js";
import type { ArchitectureDocument, CandidateFile, FileEntry, SourceSpec } from "../src/server/types/architecture.js";
import {
  AuthenticationError,
  ConfigurationError,
  NetworkError,
  RateLimitExceededError,
  ScrapeCancelledError,
  StorageError,
  TemplateFetchError,
  TemplateParseError,
} from "../src/server/types/errors.js";
import { API, FakeClock, FakeGitHub, contentsUrl, dirItem, fileItem } from "./helpers/fakeGitHub.js";

const file = (path: string): FileEntry => ({ path, rawRef: `raw:${path}`, isDirectory: false });
const dir = (path: string): FileEntry => ({ path, rawRef: "", isDirectory: true });

function arm(resourceTypes: string[], parameters: string[] = []): string {
  return JSON.stringify({
    parameters: Object.fromEntries(parameters.map((name) => [name, { type: "string" }])),
    resources: resourceTypes.map((type, index) => ({ type, name: `r${index}`, apiVersion: "2023-01-01" })),
  });
}

/** Serves fixed listings keyed by canonical source string */
class StaticStrategy implements TreeTraversalStrategy {
  readonly listed: string[] = [];

  constructor(
    private readonly listings: Record<string, FileEntry[] | SourceListing | Error>,
    readonly kind: TraversalKind = "walker",
  ) {}

  async listFiles(spec: SourceSpec): Promise<SourceListing> {
    const source = formatSourceSpec(spec);
    this.listed.push(source);
    const listing = this.listings[source];
    if (listing instanceof Error) throw listing;
    if (Array.isArray(listing)) return { entries: listing, failures: [] };
    return listing ?? { entries: [], failures: [] };
  }
}

/** Serves content keyed by rawRef; a function reply runs when fetched */
class MapFetcher implements ContentFetcher {
  readonly fetched: string[] = [];

  constructor(private readonly contents: Record<string, string | Error | (() => string)>) {}

  async fetchContent(file: CandidateFile): Promise<string> {
    this.fetched.push(file.path);
    const content = this.contents[file.rawRef];
    if (content === undefined) throw new TemplateFetchError(file.path, 404);
    if (content instanceof Error) throw content;
    return typeof content === "function" ? content() : content;
  }
}

class FailingSink extends InMemoryArchitectureSink {
  constructor(private readonly failPath: string) {
    super();
  }

  override async upsert(document: ArchitectureDocument): Promise<void> {
    if (document.sourcePath === this.failPath) {
      throw new StorageError("write conflict");
    }
    await super.upsert(document);
  }
}

const THREE_TEMPLATES = [
  dir("a"),
  file("a/azuredeploy.json"),
  dir("b"),
  file("b/azuredeploy.json"),
  dir("c"),
  file("c/azuredeploy.json"),
];

const THREE_CONTENTS = {
  "raw:a/azuredeploy.json": arm(["Microsoft.Web/sites"]),
  "raw:b/azuredeploy.json": arm(["Microsoft.Sql/servers"]),
  "raw:c/azuredeploy.json": arm(["Microsoft.Storage/storageAccounts"]),
};

describe("ArchitectureScrapeService", () => {
  it("isolates an unparseable template", async () => {
    const sink = new InMemoryArchitectureSink();
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: new MapFetcher({ ...THREE_CONTENTS, "raw:b/azuredeploy.json": "{ this is not json" }),
      sink,
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json", "c/azuredeploy.json"]);
    expect(summary.documentsWritten).toBe(2);
    expect(summary.filesSkipped).toBe(1);
    expect(summary.errors).toHaveLength(1);
    expect(summary.errors[0]).toMatchObject({ kind: "parse", source: "Org/Repo", path: "b/azuredeploy.json" });
    expect(summary.cancelled).toBe(false);
    expect(summary.aborted).toBe(false);
    expect(sink.size).toBe(2);
  });

  it("falls back to the next template of the directory when the first does not parse", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": [file("a/azuredeploy.json"), file("a/main.bicep")] }),
      fetcher: new MapFetcher({
        "raw:a/azuredeploy.json": "{ not json",
        "raw:a/main.bicep": "resource site 'Microsoft.Web/sites@2022-09-01' = {\n}\n",
      }),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents).toHaveLength(1);
    expect(summary.documents[0]).toMatchObject({
      sourcePath: "a/main.bicep",
      templateFormat: "bicep",
      resourceTypes: ["Microsoft.Web/sites"],
    });
    expect(summary.filesSkipped).toBe(0);
    expect(summary.errors).toEqual([]);
  });

  it("falls back when the preferred template cannot be fetched", async () => {
    const fetcher = new MapFetcher({ "raw:a/main.json": arm(["Microsoft.Sql/servers"]) });
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": [file("a/main.json"), file("a/azuredeploy.json")] }),
      fetcher,
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(fetcher.fetched).toEqual(["a/azuredeploy.json", "a/main.json"]);
    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/main.json"]);
    expect(summary.errors).toEqual([]);
  });

  it("skips a directory once every alternative has failed", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": [file("a/azuredeploy.json"), file("a/main.bicep")] }),
      fetcher: new MapFetcher({ "raw:a/azuredeploy.json": JSON.stringify({ $schema: "x" }) }),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents).toEqual([]);
    expect(summary.filesSkipped).toBe(1);
    expect(summary.errors).toEqual([
      {
        kind: "parse",
        source: "Org/Repo",
        path: "a/azuredeploy.json",
        message: "Cannot parse template 'a/azuredeploy.json': no resources, parameters or outputs section",
      },
      {
        kind: "fetch",
        source: "Org/Repo",
        path: "a/main.bicep",
        message: "Failed to fetch template content for 'a/main.bicep' (HTTP 404)",
      },
    ]);
  });

  it("scrapes what was listed and records the directories that failed to list", async () => {
    const failure = new NetworkError("listing kept failing");
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({
        "Org/Repo": {
          entries: [file("a/azuredeploy.json")],
          failures: [{ directory: "b", error: failure }],
        },
      }),
      fetcher: new MapFetcher(THREE_CONTENTS),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json"]);
    expect(summary.errors).toEqual([
      { kind: "network", source: "Org/Repo", path: "b", message: "listing kept failing" },
    ]);
  });

  it("produces a document for a template with empty sections", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": [file("empty/azuredeploy.json")] }),
      fetcher: new MapFetcher({ "raw:empty/azuredeploy.json": JSON.stringify({ resources: [] }) }),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents).toHaveLength(1);
    expect(summary.documents[0]).toMatchObject({ name: "empty", resourceTypes: [], resourceCount: 0 });
  });

  it("skips an invalid source and scrapes the rest", async () => {
    const strategy = new StaticStrategy({ "Org/Repo": [file("a/azuredeploy.json")] });
    const service = new ArchitectureScrapeService({
      strategy,
      fetcher: new MapFetcher(THREE_CONTENTS),
    });

    const summary = await service.run({ sources: ["bad", "Org/Repo"] });

    expect(summary.errors).toEqual([
      { kind: "configuration", source: "bad", message: 'Invalid source "bad": expected Owner/Repo[:subdir]' },
    ]);
    expect(strategy.listed).toEqual(["Org/Repo"]);
    expect(summary.documents).toHaveLength(1);
  });

  it("aborts the pass when the bulk listing rejects the credential", async () => {
    const strategy = new StaticStrategy(
      {
        "Org/Private": new AuthenticationError("GitHub rejected the request (HTTP 401)"),
        "Org/Repo": [file("a/azuredeploy.json")],
      },
      "bulk",
    );
    const service = new ArchitectureScrapeService({ strategy, fetcher: new MapFetcher(THREE_CONTENTS) });

    const summary = await service.run({ sources: ["Org/Private", "Org/Repo"] });

    expect(summary.aborted).toBe(true);
    expect(summary.cancelled).toBe(false);
    expect(strategy.listed).toEqual(["Org/Private"]);
    expect(summary.errors).toEqual([
      { kind: "authentication", source: "Org/Private", message: "GitHub rejected the request (HTTP 401)" },
    ]);
  });

  it("records an authentication failure under the walker and continues", async () => {
    const strategy = new StaticStrategy({
      "Org/Private": new AuthenticationError("denied"),
      "Org/Repo": [file("a/azuredeploy.json")],
    });
    const service = new ArchitectureScrapeService({ strategy, fetcher: new MapFetcher(THREE_CONTENTS) });

    const summary = await service.run({ sources: ["Org/Private", "Org/Repo"] });

    expect(summary.aborted).toBe(false);
    expect(strategy.listed).toEqual(["Org/Private", "Org/Repo"]);
    expect(summary.errors).toEqual([{ kind: "authentication", source: "Org/Private", message: "denied" }]);
    expect(summary.documents).toHaveLength(1);
  });

  it("records quota and transport failures per file", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: new MapFetcher({
        ...THREE_CONTENTS,
        "raw:a/azuredeploy.json": new RateLimitExceededError("quota gone"),
        "raw:b/azuredeploy.json": new NetworkError("socket hang up"),
      }),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.errors).toEqual([
      { kind: "rate-limit", source: "Org/Repo", path: "a/azuredeploy.json", message: "quota gone" },
      { kind: "network", source: "Org/Repo", path: "b/azuredeploy.json", message: "socket hang up" },
    ]);
    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["c/azuredeploy.json"]);
  });

  it("counts a failed upsert and keeps going", async () => {
    const sink = new FailingSink("b/azuredeploy.json");
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: new MapFetcher(THREE_CONTENTS),
      sink,
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documentsWritten).toBe(2);
    expect(summary.documentsFailed).toBe(1);
    expect(summary.documents).toHaveLength(3);
    expect(summary.errors).toEqual([
      { kind: "storage", source: "Org/Repo", path: "b/azuredeploy.json", message: "write conflict" },
    ]);
    expect(sink.size).toBe(2);
  });

  it("reads display fields from a sibling metadata.json", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({
        "Org/Repo": [file("a/azuredeploy.json"), file("a/metadata.json"), file("b/azuredeploy.json"), file("b/metadata.json")],
      }),
      fetcher: new MapFetcher({
        ...THREE_CONTENTS,
        "raw:a/metadata.json": JSON.stringify({ itemDisplayName: "Web App", description: "Hosts a site" }),
        "raw:b/metadata.json": "not json",
      }),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents[0]).toMatchObject({ name: "a", displayName: "Web App", description: "Hosts a site" });
    expect(summary.documents[1].displayName).toBeUndefined();
    // An unreadable metadata file is not a scrape error
    expect(summary.errors).toEqual([]);
  });

  it("stops producing documents at the limit", async () => {
    const fetcher = new MapFetcher(THREE_CONTENTS);
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES, "Org/Other": [file("x/azuredeploy.json")] }),
      fetcher,
    });

    const summary = await service.run({ sources: ["Org/Repo", "Org/Other"], limit: 2 });

    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json", "b/azuredeploy.json"]);
    expect(fetcher.fetched).toEqual(["a/azuredeploy.json", "b/azuredeploy.json"]);
  });

  it("returns the documents gathered before cancellation", async () => {
    const controller = new AbortController();
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: new MapFetcher({
        ...THREE_CONTENTS,
        "raw:b/azuredeploy.json": () => {
          controller.abort();
          throw new ScrapeCancelledError();
        },
      }),
    });

    const summary = await service.run({ sources: ["Org/Repo"], signal: controller.signal });

    expect(summary.cancelled).toBe(true);
    expect(summary.aborted).toBe(false);
    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json"]);
    expect(summary.errors).toEqual([]);
  });

  it("returns a partial summary when the pass times out", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: {
        async fetchContent(candidate, signal) {
          if (candidate.path === "a/azuredeploy.json") return THREE_CONTENTS["raw:a/azuredeploy.json"];
          // Outlives the pass timeout; settles when the pass signal fires
          return new Promise<string>((_resolve, reject) => {
            const timer = setTimeout(() => reject(new Error("pass timeout never fired")), 5_000);
            signal?.addEventListener("abort", () => {
              clearTimeout(timer);
              reject(new ScrapeCancelledError());
            });
          });
        },
      },
      timeoutMs: 50,
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.cancelled).toBe(true);
    expect(summary.aborted).toBe(false);
    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json"]);
    expect(summary.errors).toEqual([]);
  });

  it("does nothing when cancelled before starting", async () => {
    const controller = new AbortController();
    controller.abort();
    const strategy = new StaticStrategy({ "Org/Repo": THREE_TEMPLATES });
    const service = new ArchitectureScrapeService({ strategy, fetcher: new MapFetcher(THREE_CONTENTS) });

    const summary = await service.run({ sources: ["Org/Repo"], signal: controller.signal });

    expect(summary.cancelled).toBe(true);
    expect(strategy.listed).toEqual([]);
  });

  it("normalizes without writing in a dry run", async () => {
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher: new MapFetcher(THREE_CONTENTS),
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents).toHaveLength(3);
    expect(summary.documentsWritten).toBe(0);
  });

  it("processes candidates concurrently up to the configured bound", async () => {
    let active = 0;
    let peak = 0;
    const fetcher: ContentFetcher = {
      async fetchContent(candidate) {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return arm([`Microsoft.Test/${candidate.path.split("/")[0]}`]);
      },
    };
    const service = new ArchitectureScrapeService({
      strategy: new StaticStrategy({ "Org/Repo": THREE_TEMPLATES }),
      fetcher,
      concurrency: 2,
    });

    const summary = await service.run({ sources: ["Org/Repo"] });

    expect(summary.documents).toHaveLength(3);
    expect(peak).toBe(2);
  });

  it("rejects a non-positive concurrency", () => {
    expect(
      () =>
        new ArchitectureScrapeService({
          strategy: new StaticStrategy({}),
          fetcher: new MapFetcher({}),
          concurrency: 0,
        }),
    ).toThrow(ConfigurationError);
  });
});

describe("classifyScrapeError", () => {
  it("maps every error class to its summary kind", () => {
    expect(
      [
        new ConfigurationError("x"),
        new AuthenticationError("x"),
        new RateLimitExceededError("x"),
        new NetworkError("x"),
        new TemplateFetchError("p", 404),
        new TemplateParseError("p", "x"),
        new StorageError("x"),
        new Error("x"),
      ].map(classifyScrapeError),
    ).toEqual(["configuration", "authentication", "rate-limit", "network", "fetch", "parse", "storage", "unexpected"]);
  });
});

describe("scrape pipeline over the GitHub API", () => {
  const RAW_TEMPLATE = "https://raw.example/Org/Repo/examples/a/azuredeploy.json";
  const RAW_NOTES = "https://raw.example/Org/Repo/examples/b/notes.txt";

  const env: PipelineEnv = {
    GITHUB_TOKEN: undefined,
    GITHUB_API_URL: API,
    GITHUB_REF: "HEAD",
    FORCE_CONTENTS_WALK: false,
    SCRAPE_CONCURRENCY: 1,
    SCRAPE_TIMEOUT_MS: 0,
    SCRAPE_MAX_ATTEMPTS: 3,
    SCRAPE_RATE_LIMIT_MAX_WAIT_MS: 900_000,
    TEMPLATE_EXTRA_PATTERNS: [],
  };

  function anonymousRepo(clock: FakeClock): FakeGitHub {
    return new FakeGitHub(clock)
      .json(contentsUrl("Org", "Repo", "examples"), [dirItem("examples/a"), dirItem("examples/b")])
      .json(contentsUrl("Org", "Repo", "examples/a"), [fileItem("examples/a/azuredeploy.json", RAW_TEMPLATE)])
      .json(contentsUrl("Org", "Repo", "examples/b"), [fileItem("examples/b/notes.txt", RAW_NOTES)])
      .on(RAW_TEMPLATE, {
        body: arm(["Microsoft.Network/virtualNetworks", "Microsoft.Compute/virtualMachines"], ["adminUsername"]),
      });
  }

  it("walks an anonymous source down to one document", async () => {
    const clock = new FakeClock();
    const github = anonymousRepo(clock);
    const pipeline = createScrapePipeline(env, { http: github.http(), clock, sleep: clock.sleep });
    const sink = new InMemoryArchitectureSink();

    const summary = await pipeline.createService(sink).run({ sources: ["Org/Repo:examples"] });

    expect(pipeline.strategy).toBe("walker");
    expect(summary.documents).toHaveLength(1);
    expect(summary.documents[0].resourceTypes).toHaveLength(2);
    expect(summary.documents[0].parameterNames).toEqual(["adminUsername"]);
    expect(summary.documents[0].name).toBe("a");
    expect(summary.documentsWritten).toBe(1);
    expect(github.callsTo(RAW_NOTES)).toBe(0);
    expect(github.requests.every((request) => request.authorization === undefined)).toBe(true);
  });

  it("keeps the documents of a source when one directory cannot be listed", async () => {
    const clock = new FakeClock();
    const failing = contentsUrl("Org", "Repo", "b");
    const rawA = "https://raw.example/Org/Repo/a/azuredeploy.json";
    const github = new FakeGitHub(clock)
      .json(contentsUrl("Org", "Repo", ""), [dirItem("a"), dirItem("b")])
      .json(contentsUrl("Org", "Repo", "a"), [fileItem("a/azuredeploy.json", rawA)])
      .on(failing, { status: 503, body: "Service Unavailable" })
      .on(rawA, { body: arm(["Microsoft.Web/sites"]) });
    const pipeline = createScrapePipeline(env, { http: github.http(), clock, sleep: clock.sleep });

    const summary = await pipeline.createService(undefined).run({ sources: ["Org/Repo"] });

    expect(summary.documents.map((document) => document.sourcePath)).toEqual(["a/azuredeploy.json"]);
    expect(summary.errors).toEqual([
      { kind: "network", source: "Org/Repo", path: "b", message: `GET ${failing} kept returning HTTP 503` },
    ]);
  });

  it("replaces documents on a rerun instead of appending", async () => {
    const clock = new FakeClock();
    const github = anonymousRepo(clock);
    const pipeline = createScrapePipeline(env, { http: github.http(), clock, sleep: clock.sleep });
    const sink = new InMemoryArchitectureSink();

    const first = await pipeline.createService(sink).run({ sources: ["Org/Repo:examples"] });
    clock.advance(60_000);
    const second = await pipeline.createService(sink).run({ sources: ["Org/Repo:examples"] });

    expect(sink.size).toBe(1);
    expect(second.documents[0].id).toBe(first.documents[0].id);
    expect(sink.get(first.documents[0].id)?.scrapedAt).toEqual(new Date(1_060_000));
    expect(first.documents[0].scrapedAt).toEqual(new Date(1_000_000));
  });

  it("uses one bulk listing call when a token is configured", async () => {
    const clock = new FakeClock();
    const blobUrl = `${API}/repos/Org/Repo/git/blobs/a1`;
    const github = new FakeGitHub(clock)
      .json(`${API}/repos/Org/Repo/git/trees/HEAD?recursive=1`, {
        sha: "root",
        tree: [
          { path: "examples/a", type: "tree", sha: "d1" },
          { path: "examples/a/azuredeploy.json", type: "blob", sha: "a1", url: blobUrl },
        ],
      })
      .json(blobUrl, {
        sha: "a1",
        encoding: "base64",
        content: Buffer.from(arm(["Microsoft.Web/sites"])).toString("base64"),
      });
    const pipeline = createScrapePipeline(
      { ...env, GITHUB_TOKEN: "test-token" },
      { http: github.http(), clock, sleep: clock.sleep },
    );

    const summary = await pipeline.createService(undefined).run({ sources: ["Org/Repo:examples"] });

    expect(pipeline.strategy).toBe("bulk");
    expect(summary.documents.map((document) => document.resourceTypes)).toEqual([["Microsoft.Web/sites"]]);
    expect(github.requests.map((request) => request.authorization)).toEqual(["Bearer test-token", "Bearer test-token"]);
  });

  it("walks even with a token when forced", () => {
    const pipeline = createScrapePipeline({ ...env, GITHUB_TOKEN: "test-token", FORCE_CONTENTS_WALK: true });
    expect(pipeline.strategy).toBe("walker");
  });
});
