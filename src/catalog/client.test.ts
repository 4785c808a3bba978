import { describe, it, expect } from "vitest";
import { CatalogClient, pathUidFromUrl, toCatalogEntity } from "./client";
import { createFakeFetch } from "../testing/fake-fetch";
import type { FakeHandler } from "../testing/fake-fetch";
import { entity, testConfig, testHttp } from "../testing/fixtures";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";

function createClient(handler: FakeHandler, unitBatchSize = 10) {
  const fake = createFakeFetch(handler);
  const config = testConfig();
  config.api.unitBatchSize = unitBatchSize;
  const tracker = new Tracker();
  const client = new CatalogClient(
    config.api,
    testHttp(fake.fetch, config),
    new Logger("error"),
    tracker,
  );
  return { client, fake, tracker };
}

function requestedUids(url: URL): string[] {
  return (url.searchParams.get("uid") ?? "").split(",").filter(Boolean);
}

describe("toCatalogEntity", () => {
  it("takes module children from learning paths", () => {
    const path = toCatalogEntity(
      { uid: "learn.p", title: "Path", modules: ["m1", "m2"], units: ["x"] },
      "learningPaths",
    );
    expect(path.children).toEqual(["m1", "m2"]);
    expect(path.summary).toBe("");
  });

  it("takes learning path children from a course study guide", () => {
    const course = toCatalogEntity(
      {
        uid: "course.c",
        study_guide: [
          { uid: "learn.a", type: "learningPath" },
          { uid: "exam.x", type: "exam" },
          { uid: "learn.b", type: "learningPath" },
        ],
      },
      "courses",
    );
    expect(course.children).toEqual(["learn.a", "learn.b"]);
  });
});

describe("CatalogClient.fetchCatalog", () => {
  it("sends locale, type and joined UIDs", async () => {
    const { client, fake } = createClient(() => ({ json: {} }));
    await client.fetchCatalog({ type: "modules", uid: ["m1", "m2"] });

    const url = new URL(fake.calls[0]);
    expect(url.searchParams.get("locale")).toBe("en-us");
    expect(url.searchParams.get("type")).toBe("modules");
    expect(url.searchParams.get("uid")).toBe("m1,m2");
  });

  it("rejects responses that fail validation", async () => {
    const { client } = createClient(() => ({
      json: { modules: [{ title: "No UID" }] },
    }));
    await expect(client.fetchCatalog({ type: "modules" })).rejects.toThrow();
  });
});

describe("CatalogClient.searchCatalog", () => {
  const handler: FakeHandler = (url) => {
    const type = url.searchParams.get("type");
    if (type === "learningPaths") {
      return {
        json: {
          learningPaths: [
            { uid: "learn.intro", title: "Intro to PL-200" },
            { uid: "learn.other", title: "Something else" },
          ],
        },
      };
    }
    return {
      json: {
        courses: [
          { uid: "course.pp", title: "Power Platform", course_number: "PL-200" },
        ],
      },
    };
  };

  it("matches with punctuation stripped and keeps catalog order", async () => {
    const { client } = createClient(handler);
    const results = await client.searchCatalog("pl200");
    expect(results.map((item) => item.uid)).toEqual([
      "learn.intro",
      "course.pp",
    ]);
  });

  it("returns an empty list when nothing matches", async () => {
    const { client } = createClient(handler);
    await expect(client.searchCatalog("kubernetes")).resolves.toEqual([]);
  });

  it("only queries the requested types", async () => {
    const { client, fake } = createClient(handler);
    await client.searchCatalog("intro", ["learningPaths"]);
    expect(fake.calls).toHaveLength(1);
    expect(new URL(fake.calls[0]).searchParams.get("type")).toBe(
      "learningPaths",
    );
  });
});

describe("CatalogClient.resolveByUid", () => {
  it("returns the entity with that UID", async () => {
    const { client } = createClient(() => ({
      json: { learningPaths: [{ uid: "learn.sample-path", title: "Sample" }] },
    }));
    const path = await client.resolveByUid("learn.sample-path");
    expect(path?.title).toBe("Sample");
    expect(path?.type).toBe("learningPaths");
  });

  it("returns null when the catalog has no such entity", async () => {
    const { client } = createClient(() => ({ json: { learningPaths: [] } }));
    await expect(client.resolveByUid("learn.missing")).resolves.toBe(null);
  });
});

describe("CatalogClient.resolveByUrl", () => {
  it("derives the UID from the path slug", async () => {
    const { client, fake } = createClient(() => ({
      json: { learningPaths: [{ uid: "learn.sample-path" }] },
    }));
    const path = await client.resolveByUrl(
      "https://learn.example.com/en-us/training/paths/sample-path/",
    );
    expect(path?.uid).toBe("learn.sample-path");
    expect(new URL(fake.calls[0]).searchParams.get("uid")).toBe(
      "learn.sample-path",
    );
  });

  it("returns null without a request when the URL has no path slug", async () => {
    const { client, fake } = createClient(() => ({ json: {} }));
    await expect(
      client.resolveByUrl("https://learn.example.com/en-us/training/modules/x/"),
    ).resolves.toBe(null);
    expect(fake.calls).toEqual([]);
  });
});

describe("pathUidFromUrl", () => {
  it("accepts bare pathnames", () => {
    expect(pathUidFromUrl("/training/paths/azure-basics")).toBe(
      "learn.azure-basics",
    );
  });

  it("rejects a trailing paths segment", () => {
    expect(pathUidFromUrl("https://learn.example.com/training/paths/")).toBe(
      null,
    );
  });
});

describe("CatalogClient.fetchModules", () => {
  it("orders modules by the path and drops missing ones", async () => {
    const { client, fake } = createClient(() => ({
      json: { modules: [{ uid: "m1" }, { uid: "m2" }] },
    }));
    const path = entity("learn.p", {
      type: "learningPaths",
      children: ["m2", "m3", "m1"],
    });

    const modules = await client.fetchModules(path);
    expect(modules.map((module) => module.uid)).toEqual(["m2", "m1"]);
    expect(fake.calls).toHaveLength(1);
  });

  it("makes no request for a path without modules", async () => {
    const { client, fake } = createClient(() => ({ json: {} }));
    const path = entity("learn.p", { type: "learningPaths" });
    await expect(client.fetchModules(path)).resolves.toEqual([]);
    expect(fake.calls).toEqual([]);
  });
});

describe("CatalogClient.fetchUnitsForModules", () => {
  const modules = [
    entity("m1", { type: "modules", children: ["u1", "u2", "u3"] }),
    entity("m2", { type: "modules", children: ["u4"] }),
  ];

  it("batches requests and restores per-module order", async () => {
    const { client, fake } = createClient((url) => ({
      json: {
        units: requestedUids(url)
          .reverse()
          .map((uid) => ({ uid, title: uid.toUpperCase() })),
      },
    }), 2);

    const units = await client.fetchUnitsForModules(modules);
    expect(fake.calls).toHaveLength(2);
    expect(units.get("m1")?.map((unit) => unit.uid)).toEqual([
      "u1",
      "u2",
      "u3",
    ]);
    expect(units.get("m2")?.map((unit) => unit.title)).toEqual(["U4"]);
  });

  it("skips a failed batch and records it", async () => {
    const { client, tracker } = createClient((url) => {
      const uids = requestedUids(url);
      if (uids.includes("u3")) return { status: 500 };
      return { json: { units: uids.map((uid) => ({ uid })) } };
    }, 2);

    const units = await client.fetchUnitsForModules(modules);
    expect(units.get("m1")?.map((unit) => unit.uid)).toEqual(["u1", "u2"]);
    expect(units.get("m2")).toEqual([]);

    const issues = tracker.getIssues("catalog");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ path: "u3,u4", reason: "http-error" });
  });
});
