import { readFileSync } from "fs";
import path from "path";
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";

export interface FakeReply {
  status: number;
  /** Objects are sent as JSON, strings as they are. */
  body: unknown;
}

export type FakeHandler = (config: InternalAxiosRequestConfig) => FakeReply;

/**
 * Stands in for the song.link API: answers every request in-process and records it.
 */
export function fakeUpstream(reply: FakeReply | FakeHandler) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const { status, body } = typeof reply === "function" ? reply(config) : reply;
    const response: AxiosResponse = {
      data: typeof body === "string" ? body : JSON.stringify(body),
      status,
      statusText: String(status),
      headers: {},
      config
    };
    return response;
  };
  return { adapter, calls };
}

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(path.join(__dirname, "..", "fixtures", name), "utf-8"));
}
