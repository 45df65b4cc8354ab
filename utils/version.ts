import { existsSync, readFileSync } from "fs";
import path from "path";
import { isPayload } from "../interfaces/ApiPayload";

// Sources live one level below package.json; the build output two.
const CANDIDATES = [path.resolve(__dirname, "../package.json"), path.resolve(__dirname, "../../package.json")];

function readVersion(): string {
  for (const candidate of CANDIDATES) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
    if (isPayload(pkg) && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "";
}

export const version = readVersion();
export const userAgent = `SongLinkAPI/v${version}`;
