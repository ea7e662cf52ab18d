import axios, { type AxiosInstance } from "axios";
import type { Config } from "./config";

export function createHttp({ requestTimeoutMs, userAgent }: Pick<Config, "requestTimeoutMs" | "userAgent">): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout: requestTimeoutMs,
    responseType: "text",
    // callers look at the status themselves
    validateStatus: () => true,
  });
}

export type FetchedPage = { status: number; html: string };

export async function getPage(http: AxiosInstance, url: string): Promise<FetchedPage> {
  const res = await http.get<unknown>(url, { responseType: "text" });
  return { status: res.status, html: typeof res.data === "string" ? res.data : "" };
}
