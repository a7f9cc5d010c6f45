import { existsSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { SessionReportSchema, emptySummary, type SessionReport } from "../types/outcome";
import { describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { REPORTS_DIR } from "../config/paths";
import { INBOX } from "../selectors";
import { sleep } from "../utils/delay";
import { processConversation, type AmplifierContext } from "../orchestrator/conversation";
import { findConversationElements, inboxUrl } from "../orchestrator/inbox";

type ConversationRow = SessionReport["conversations"][number];

/**
 * One session: `iterationsPerSession` passes over every conversation in the
 * inbox. A conversation that throws counts as zero progress; the pass moves
 * on to the next one.
 */
export async function runSession(ctx: AmplifierContext, now: () => Date = () => new Date()): Promise<SessionReport> {
  const { config } = ctx;
  const log = ctx.log ?? createLogger("session");
  const startedAt = now().toISOString();
  const rows: ConversationRow[] = [];

  for (let iteration = 1; iteration <= config.iterationsPerSession; iteration++) {
    log.info(`═══ Pass ${iteration}/${config.iterationsPerSession} ═══`);

    await gotoInbox(ctx, log);
    const count = (await findConversationElements(ctx.page, config, log)).length;
    if (count === 0) {
      log.warn("Inbox shows no conversations this pass");
      continue;
    }
    log.info(`${count} conversation(s) to check`);

    for (let index = 0; index < count; index++) {
      try {
        if (index > 0) await gotoInbox(ctx, log);
        const summary = await processConversation(ctx, index);
        rows.push({ ...summary, iteration });
      } catch (error) {
        log.error(`Conversation ${index + 1} aborted: ${describeError(error)}`);
        rows.push({ ...emptySummary(index), iteration });
      }
    }
  }

  const report = buildReport(startedAt, now().toISOString(), config.iterationsPerSession, rows);
  log.info(
    `Session done: ${report.totals.amplified} reposted, ${report.totals.alreadyAmplified} already reposted, ` +
      `${report.totals.failed} failed, ${report.totals.watermarksPosted} watermark(s) posted`,
  );
  return report;
}

async function gotoInbox(ctx: AmplifierContext, log: Logger): Promise<void> {
  const { config, page } = ctx;
  await page.goto(inboxUrl(config));
  if (!(await page.waitForSelector(INBOX.ready, config.timing.inboxTimeoutMs))) {
    log.warn("Inbox list did not show up in time");
  }
  await sleep(config.timing.navigationSettleMs);
}

export function buildReport(
  startedAt: string,
  finishedAt: string,
  iterations: number,
  conversations: ConversationRow[],
): SessionReport {
  const totals = { found: 0, amplified: 0, alreadyAmplified: 0, failed: 0, watermarksPosted: 0 };
  for (const row of conversations) {
    totals.found += row.found;
    totals.amplified += row.amplified;
    totals.alreadyAmplified += row.alreadyAmplified;
    totals.failed += row.failed;
    if (row.watermarkPosted) totals.watermarksPosted++;
  }
  return SessionReportSchema.parse({ startedAt, finishedAt, iterations, conversations, totals });
}

/**
 * Write the report as `session-<startedAt>.json`. Returns the path.
 */
export function saveSessionReport(report: SessionReport, dir: string = REPORTS_DIR): string {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const path = join(dir, `session-${report.startedAt.replace(/[:.]/g, "-")}.json`);
  writeFileSync(path, JSON.stringify(report, null, 2));
  return path;
}
