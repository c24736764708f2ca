import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { DatasetBuildError } from "../dataset/errors";
import { Result } from "../type/result";

const MapZoneSchema = z.object({
  "@other": z.string().min(1),
  "@territory": z.string().min(1).optional(),
  "@type": z.string(),
});

const WindowsZonesDocumentSchema = z.object({
  supplementalData: z.object({
    windowsZones: z.object({
      mapTimezones: z.object({
        "@otherVersion": z.string(),
        "@typeVersion": z.string(),
        mapZone: z.array(MapZoneSchema).min(1),
      }),
    }),
  }),
});

/**
 * One <mapZone> element, IANA names still unvalidated
 */
export interface RawZone {
  zone: string;
  territory: string | null;
  types: string;
}

/**
 * Content of windowsZones.xml relevant to the dataset
 */
export interface RawDocument {
  otherVersion: string;
  typeVersion: string;
  zones: RawZone[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  parseAttributeValue: false,
  isArray: (tagName) => tagName === "mapZone",
});

/**
 * Deserialize the mapping document
 * @param xml Raw windowsZones.xml text
 * @returns Result<RawDocument>, failed on malformed markup or unexpected structure
 */
export function parseDocument(xml: string): Result<RawDocument> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    return Result<RawDocument>(
      new DatasetBuildError(
        "parse",
        `Malformed XML (${code}) at ${line}:${col}: ${msg}`
      )
    );
  }

  const parsed = WindowsZonesDocumentSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    return Result<RawDocument>(
      new DatasetBuildError(
        "parse",
        `Unexpected document structure:\n${z.prettifyError(parsed.error)}`
      )
    );
  }

  const mapTimezones = parsed.data.supplementalData.windowsZones.mapTimezones;
  return Result<RawDocument>({
    otherVersion: mapTimezones["@otherVersion"],
    typeVersion: mapTimezones["@typeVersion"],
    zones: mapTimezones.mapZone.map((entry) => ({
      zone: entry["@other"],
      territory: entry["@territory"] ?? null,
      types: entry["@type"],
    })),
  });
}
