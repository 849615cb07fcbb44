import axios from "axios";
import { NetworkError } from "./errors";

export interface Transport {
  fetch(locator: string): Promise<Uint8Array>;
}

// Any source with a scheme separator is downloaded instead of read from disk
export function isRemote(source: string): boolean {
  return source.includes("://");
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return "timed out";
    }
    if (error.code === "ERR_NETWORK" || error.code === "ENOTFOUND") {
      return "host unreachable";
    }
    if (error.code === "ECONNREFUSED") {
      return "connection refused";
    }
    if (error.response?.status) {
      const { status, statusText } = error.response;
      return `HTTP ${status} ${statusText}`.trim();
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function createHttpTransport(timeoutMs: number): Transport {
  return {
    async fetch(locator) {
      try {
        const response = await axios.get<ArrayBuffer>(locator, {
          responseType: "arraybuffer",
          timeout: timeoutMs,
          maxRedirects: 5,
          headers: {
            "User-Agent": "bookmark/1.0",
          },
        });
        return new Uint8Array(response.data);
      } catch (error) {
        throw new NetworkError(locator, describeAxiosError(error));
      }
    },
  };
}
