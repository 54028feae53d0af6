import { describe, it, expect, vi } from "vitest";
import type { ScrapeTarget } from "@scrapeline/shared";
import { resolveTargets, addressToUrl } from "./target-resolver.js";
import { DynamicTargetSet } from "./dynamic-targets.js";
import { ResolutionError } from "../errors.js";
import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockLogger() {
  return {
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

function discovered(href: string, address: string): ScrapeTarget {
  const url = new URL(href);
  return { originalUrl: url, url: new URL(href), address, tags: { container_name: "web" }, source: "discovered" };
}

// ---------------------------------------------------------------------------
// Static URLs
// ---------------------------------------------------------------------------

describe("resolveTargets static URLs", () => {
  it("keeps every parsable URL and skips the rest with a warning", async () => {
    const logger = createMockLogger();
    const targets = await resolveTargets({
      urls: ["http://a:9100/metrics", "not a url", "http://b:9100"],
      services: [],
      logger,
    });

    expect(targets.map((t) => t.url.href)).toEqual(["http://a:9100/metrics", "http://b:9100/"]);
    expect(targets.every((t) => t.source === "static" && t.address === undefined)).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns an empty list when nothing is configured", async () => {
    expect(await resolveTargets({ urls: [], services: [] })).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Service URLs
// ---------------------------------------------------------------------------

describe("resolveTargets service URLs", () => {
  it("produces one target per resolved address", async () => {
    const lookupHost = vi.fn().mockResolvedValue(["10.0.0.1", "10.0.0.2"]);
    const service = "http://user:pw@my-svc.ns:9100/metrics?x=1";

    const targets = await resolveTargets({ urls: [], services: [service], lookupHost });

    expect(lookupHost).toHaveBeenCalledWith("my-svc.ns");
    expect(targets).toHaveLength(2);
    expect(targets.map((t) => t.url.href)).toEqual([
      "http://user:pw@10.0.0.1:9100/metrics?x=1",
      "http://user:pw@10.0.0.2:9100/metrics?x=1",
    ]);
    expect(targets.map((t) => t.address)).toEqual(["10.0.0.1", "10.0.0.2"]);
    for (const t of targets) {
      expect(t.originalUrl.href).toBe(service);
      expect(t.source).toBe("service");
    }
  });

  it("produces no targets for a name without addresses", async () => {
    const lookupHost = vi.fn().mockResolvedValue([]);
    const targets = await resolveTargets({
      urls: [],
      services: ["http://empty:9100/metrics"],
      lookupHost,
    });
    expect(targets).toEqual([]);
  });

  it("skips a service whose name does not resolve", async () => {
    const logger = createMockLogger();
    const lookupHost = vi.fn(async (host: string) => {
      if (host === "missing") throw new Error("ENOTFOUND missing");
      return ["10.0.0.9"];
    });

    const targets = await resolveTargets({
      urls: [],
      services: ["http://missing:9100/metrics", "http://present:9100/metrics"],
      lookupHost,
      logger,
    });

    expect(targets.map((t) => t.url.href)).toEqual(["http://10.0.0.9:9100/metrics"]);
    expect(logger.warn).toHaveBeenCalledWith(
      { service: "missing:9100", err: "ENOTFOUND missing" },
      "Could not resolve missing:9100, skipping it",
    );
  });

  it("fails the resolution on a malformed service URL", async () => {
    await expect(
      resolveTargets({ urls: [], services: ["::not-a-url"], lookupHost: vi.fn() }),
    ).rejects.toThrow(ResolutionError);
  });
});

describe("addressToUrl", () => {
  it("keeps scheme, port, path and query", () => {
    const url = new URL("https://svc:8443/custom/path?a=b");
    expect(addressToUrl(url, "10.1.2.3").href).toBe("https://10.1.2.3:8443/custom/path?a=b");
  });

  it("brackets IPv6 addresses", () => {
    expect(addressToUrl(new URL("http://svc:9100/m"), "fd00::1").href).toBe("http://[fd00::1]:9100/m");
  });
});

// ---------------------------------------------------------------------------
// Discovered targets and merging
// ---------------------------------------------------------------------------

describe("resolveTargets merging", () => {
  it("concatenates static, discovered and service targets without de-duplicating", async () => {
    const dynamicTargets = new DynamicTargetSet();
    dynamicTargets.set("c1", discovered("http://10.0.0.5:9102/metrics", "10.0.0.5"));

    const targets = await resolveTargets({
      urls: ["http://10.0.0.5:9102/metrics"],
      services: ["http://svc:9100/metrics"],
      dynamicTargets,
      lookupHost: vi.fn().mockResolvedValue(["10.0.0.7"]),
    });

    expect(targets.map((t) => [t.source, t.url.href])).toEqual([
      ["static", "http://10.0.0.5:9102/metrics"],
      ["discovered", "http://10.0.0.5:9102/metrics"],
      ["service", "http://10.0.0.7:9100/metrics"],
    ]);
  });

  it("returns copies of discovered targets", async () => {
    const dynamicTargets = new DynamicTargetSet();
    dynamicTargets.set("c1", discovered("http://10.0.0.5:9102/metrics", "10.0.0.5"));

    const [first] = await resolveTargets({ urls: [], services: [], dynamicTargets });
    first.tags.container_name = "changed";

    const [second] = await resolveTargets({ urls: [], services: [], dynamicTargets });
    expect(second.tags.container_name).toBe("web");
  });

  it("gives the same targets when nothing changed", async () => {
    const options = {
      urls: ["http://a:9100/metrics"],
      services: ["http://svc:9100/metrics"],
      lookupHost: vi.fn().mockResolvedValue(["10.0.0.1", "10.0.0.2"]),
    };

    const first = await resolveTargets(options);
    const second = await resolveTargets(options);

    const hrefs = (ts: ScrapeTarget[]) => ts.map((t) => t.url.href).sort();
    expect(hrefs(second)).toEqual(hrefs(first));
  });
});
