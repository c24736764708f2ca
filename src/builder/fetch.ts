import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { DatasetBuildError } from "../dataset/errors";
import { logger } from "../logger";
import { Result } from "../type/result";

/**
 * The part of an axios instance the fetch stage relies on
 */
export type HttpClient = Pick<AxiosInstance, "get">;

/**
 * Download the mapping document
 *
 * No retry: a failed download must abort the build rather than
 * leave a stale dataset behind.
 *
 * @param url Upstream location of windowsZones.xml
 * @param client HTTP client, a fresh axios instance by default
 * @returns Result<string> with the raw XML text
 */
export async function fetchDocument(
  url: string,
  client: HttpClient = axios.create()
): Promise<Result<string>> {
  logger.debug("Fetching mapping document", { url });
  try {
    const response = await client.get<unknown>(url, { responseType: "text" });

    if (response.status < 200 || response.status >= 300) {
      return Result<string>(
        new DatasetBuildError(
          "fetch",
          `GET ${url} returned HTTP ${response.status}`
        )
      );
    }

    const body = z.string().min(1).safeParse(response.data);
    if (!body.success) {
      return Result<string>(
        new DatasetBuildError("fetch", `GET ${url} returned an empty or non-text body`)
      );
    }

    logger.debug("Mapping document fetched", {
      url,
      bytes: Buffer.byteLength(body.data),
    });
    return Result(body.data);
  } catch (error) {
    const message = axios.isAxiosError(error)
      ? error.response
        ? `GET ${url} returned HTTP ${error.response.status}`
        : `GET ${url} failed: ${error.message}`
      : `GET ${url} failed: ${error instanceof Error ? error.message : String(error)}`;
    return Result<string>(new DatasetBuildError("fetch", message, { cause: error }));
  }
}
