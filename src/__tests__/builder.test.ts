import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { renderDataset } from "../builder/emit";
import { fetchDocument, type HttpClient } from "../builder/fetch";
import { computeContentHash } from "../builder/hash";
import { parseDocument } from "../builder/parse";
import { buildDataset, compileDataset } from "../builder/pipeline";
import { splitTypes, UTC_ZONE, validateZones } from "../builder/validate";
import { DatasetBuildError } from "../dataset/errors";
import { WindowsZones } from "../dataset/windows-zones";
import { FIXED_NOW, FIXTURE_XML } from "./testUtils";

const SOURCE = "https://example.test/windowsZones.xml";

function stubClient(get: HttpClient["get"]): HttpClient {
  return { get };
}

describe("fetchDocument", () => {
  it("returns the response body", async () => {
    const get = vi.fn().mockResolvedValue({ status: 200, data: FIXTURE_XML });

    const { data, err } = await fetchDocument(SOURCE, stubClient(get));

    expect(err).toBeNull();
    expect(data).toBe(FIXTURE_XML);
    expect(get).toHaveBeenCalledWith(SOURCE, { responseType: "text" });
  });

  it("fails on a non-success status", async () => {
    const get = vi.fn().mockResolvedValue({ status: 503, data: "unavailable" });

    const { data, err } = await fetchDocument(SOURCE, stubClient(get));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err?.message).toBe(`[fetch] GET ${SOURCE} returned HTTP 503`);
  });

  it("fails on a network error", async () => {
    const get = vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));

    const { err } = await fetchDocument(SOURCE, stubClient(get));

    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err?.message).toBe(`[fetch] GET ${SOURCE} failed: getaddrinfo ENOTFOUND`);
  });

  it("fails on an empty body", async () => {
    const get = vi.fn().mockResolvedValue({ status: 200, data: "" });

    const { err } = await fetchDocument(SOURCE, stubClient(get));

    expect(err?.message).toBe(`[fetch] GET ${SOURCE} returned an empty or non-text body`);
  });
});

describe("parseDocument", () => {
  it("reads versions and records in document order", () => {
    const { data, err } = parseDocument(FIXTURE_XML);

    expect(err).toBeNull();
    expect(data?.otherVersion).toBe("7e11800");
    expect(data?.typeVersion).toBe("2021a");
    expect(data?.zones).toHaveLength(20);
    expect(data?.zones[0]).toEqual({
      zone: "US Mountain Standard Time",
      territory: "001",
      types: "America/Phoenix",
    });
    expect(data?.zones[1]?.types).toBe(
      "America/Creston America/Dawson_Creek America/Fort_Nelson"
    );
  });

  it("keeps a missing territory as null", () => {
    const xml = `<supplementalData><windowsZones><mapTimezones otherVersion="1" typeVersion="2">
      <mapZone other="Tokyo Standard Time" type="Asia/Tokyo"/>
    </mapTimezones></windowsZones></supplementalData>`;

    const { data } = parseDocument(xml);

    expect(data?.zones).toEqual([
      { zone: "Tokyo Standard Time", territory: null, types: "Asia/Tokyo" },
    ]);
  });

  it("rejects malformed markup", () => {
    const { data, err } = parseDocument("<supplementalData><windowsZones>");

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err?.message.startsWith("[parse] Malformed XML")).toBe(true);
  });

  it("rejects a document without version attributes", () => {
    const xml = `<supplementalData><windowsZones><mapTimezones>
      <mapZone other="Tokyo Standard Time" territory="001" type="Asia/Tokyo"/>
    </mapTimezones></windowsZones></supplementalData>`;

    const { err } = parseDocument(xml);

    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err?.message.startsWith("[parse] Unexpected document structure")).toBe(true);
  });
});

describe("validateZones", () => {
  it("splits candidates and appends the UTC record", () => {
    const { data, err } = validateZones([
      { zone: "Romance Standard Time", territory: "ES", types: "Europe/Madrid  Africa/Ceuta" },
    ]);

    expect(err).toBeNull();
    expect(data).toEqual([
      { zone: "Romance Standard Time", territory: "ES", iana: ["Europe/Madrid", "Africa/Ceuta"] },
      { zone: "Coordinated Universal Time", territory: null, iana: ["Etc/UTC"] },
    ]);
  });

  it("aborts on an invalid IANA name", () => {
    const { data, err } = validateZones([
      { zone: "Romance Standard Time", territory: "001", types: "Europe/Paris" },
      { zone: "Olympus Standard Time", territory: "MA", types: "Europe/Paris Mars/Olympus_Mons" },
    ]);

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err?.message).toBe(
      '[validate] Invalid IANA timezone "Mars/Olympus_Mons" listed for "Olympus Standard Time" (MA)'
    );
  });

  it("aborts on an empty candidate list", () => {
    const { err } = validateZones([
      { zone: "Tokyo Standard Time", territory: null, types: "  " },
    ]);

    expect(err?.message).toBe('[validate] No IANA timezone listed for "Tokyo Standard Time"');
  });

  it("keeps the first of repeated zone and territory pairs", () => {
    const { data } = validateZones([
      { zone: "Tokyo Standard Time", territory: "JP", types: "Asia/Tokyo" },
      { zone: "Tokyo Standard Time", territory: "JP", types: "Asia/Seoul" },
    ]);

    expect(data?.map((entry) => entry.iana)).toEqual([["Asia/Tokyo"], UTC_ZONE.iana]);
  });

  it("drops repeated names within a record", () => {
    expect(splitTypes("Europe/Berlin Europe/Busingen Europe/Berlin")).toEqual([
      "Europe/Berlin",
      "Europe/Busingen",
    ]);
  });
});

describe("computeContentHash", () => {
  const zones = [
    { zone: "W. Europe Standard Time", territory: "AT", iana: ["Europe/Vienna"] },
    { ...UTC_ZONE },
  ];

  it("is a stable 64-bit hex value", () => {
    const first = computeContentHash(zones, ["7e11800", "2021a"]).unwrap();
    const second = computeContentHash(
      zones.map((entry) => ({ ...entry, iana: [...entry.iana] })),
      ["7e11800", "2021a"]
    ).unwrap();

    expect(first).toMatch(/^[0-9a-f]{16}$/);
    expect(second).toBe(first);
  });

  it("changes with any candidate or version", () => {
    const base = computeContentHash(zones, ["7e11800", "2021a"]).unwrap();
    const changedCandidate = computeContentHash(
      [
        { zone: "W. Europe Standard Time", territory: "AT", iana: ["Europe/Zurich"] },
        { ...UTC_ZONE },
      ],
      ["7e11800", "2021a"]
    ).unwrap();
    const changedVersion = computeContentHash(zones, ["7e11800", "2021b"]).unwrap();

    expect(changedCandidate).not.toBe(base);
    expect(changedVersion).not.toBe(base);
  });
});

describe("compileDataset", () => {
  it("produces identical artifacts from identical input", () => {
    const first = compileDataset(FIXTURE_XML, { now: FIXED_NOW }).unwrap();
    const second = compileDataset(FIXTURE_XML, { now: FIXED_NOW }).unwrap();

    expect(second).toEqual(first);
    expect(first.version).toEqual({
      buildTimestamp: "2026-01-02T03:04:05.000Z",
      sourceVersion: ["7e11800", "2021a"],
      contentHash: first.version.contentHash,
    });
    expect(first.version.contentHash).toMatch(/^[0-9a-f]{16}$/);
    expect(first.zones).toHaveLength(21);
    expect(first.zones[20]).toEqual(UTC_ZONE);
  });

  it("fingerprints a changed mapping differently", () => {
    const changed = FIXTURE_XML.replace(
      'territory="AD" type="Europe/Andorra"',
      'territory="AD" type="Europe/Madrid"'
    );

    const base = compileDataset(FIXTURE_XML, { now: FIXED_NOW }).unwrap();
    const drifted = compileDataset(changed, { now: FIXED_NOW }).unwrap();

    expect(changed).not.toBe(FIXTURE_XML);
    expect(drifted.version.contentHash).not.toBe(base.version.contentHash);
  });
});

describe("buildDataset", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "windows-zones-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("writes an artifact the run-time loader accepts", async () => {
    const output = join(workDir, "nested", "windows-zones.json");
    const get = vi.fn().mockResolvedValue({ status: 200, data: FIXTURE_XML });

    const artifact = (
      await buildDataset({
        source: SOURCE,
        output,
        client: stubClient(get),
        now: FIXED_NOW,
      })
    ).unwrap();

    expect(await readFile(output, "utf-8")).toBe(renderDataset(artifact));

    const zones = WindowsZones.load(output);
    expect(zones.get("US Mountain Standard Time", "CA")?.iana[0]).toBe("America/Creston");
    expect(zones.sourceVersion()).toEqual(["7e11800", "2021a"]);
    expect(zones.hash()).toBe(artifact.version.contentHash);
  });

  it("stops before writing when a stage fails", async () => {
    const output = join(workDir, "windows-zones.json");
    const get = vi.fn().mockResolvedValue({
      status: 200,
      data: FIXTURE_XML.replace('type="Asia/Tokyo"', 'type="Asia/Atlantis"'),
    });

    const { data, err } = await buildDataset({
      source: SOURCE,
      output,
      client: stubClient(get),
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(DatasetBuildError);
    expect(err instanceof DatasetBuildError && err.stage).toBe("validate");
    await expect(readFile(output, "utf-8")).rejects.toThrow();
  });
});
