/**
 * dm-amplifier
 *
 * Finds the posts shared in an X inbox since the last watermark message,
 * reposts each one once, and leaves a new watermark behind.
 */

export * from "./types/config";
export * from "./types/candidate";
export * from "./types/outcome";
export * from "./types/errors";
export { loadConfig, buildConfig, headlessFromEnv } from "./config";
export { createLogger, initRunLog, silentLogger, type Logger } from "./logging/logger";
export type { BrowserDriver, PageDriver, ElementRef, Box } from "./browser/driver";
export { launchBrowser, checkLoginStatus } from "./browser/launch";
export { parseCookieFile, loadCookieFile, saveCookieFile, type SessionCookie } from "./session/cookies";
export { captureCandidates } from "./capture/scroll-capture";
export { dedupeCandidates } from "./capture/dedupe";
export { signatureKey, resolveCandidateUrl } from "./capture/signature";
export { postWatermark } from "./capture/watermark";
export { amplifyPost } from "./actions/amplify";
export { undoAllReposts } from "./actions/undo";
export { processConversation, type AmplifierContext } from "./orchestrator/conversation";
export { runSession, saveSessionReport } from "./session/controller";
