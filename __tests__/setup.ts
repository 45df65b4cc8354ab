// Test setup - keep logs and caches out of the working tree
import os from "os";
import path from "path";

process.env.LOG_FILE = "false";
process.env.LOG_TERMINAL = "false";
process.env.DEBUG = "false";
process.env.CACHE_PATH = path.join(os.tmpdir(), "songlink-client-test-cache.json");
