import { join } from "path";

// Paths for persistent state
export const DATA_DIR = process.env.DATA_DIR || join(process.cwd(), ".dm-amplifier");
export const LOG_DIR = join(DATA_DIR, "logs");
export const REPORTS_DIR = join(DATA_DIR, "reports");
export const DEBUG_DIR = join(DATA_DIR, "debug");

export const CONFIG_PATH = process.env.CONFIG_PATH || join(process.cwd(), "config.json");
export const COOKIES_PATH = process.env.COOKIES_PATH || join(process.cwd(), "cookies.txt");
