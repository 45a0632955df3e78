/**
 * Human-intervention & polling manager.
 *
 * When the workflow parks on missing input it raises an intervention and
 * arms one poll loop for the case. Each tick checks whether the input has
 * arrived; once it has, the intervention is resolved, the loop stops and
 * the workflow is resumed. Loops are `setTimeout` chains, so ticks for a
 * case never overlap, and the timers are unref'd.
 */

import type { CaseStore } from "../store/case-store.ts";
import type { InterventionKind, InterventionRecord } from "../types/case.ts";
import type { OrchestratorConfig } from "../types/config.ts";
import type { PollingControl } from "./action-executor.ts";
import { CaseNotFoundError } from "./errors.ts";
import { COLLECTIONS } from "../database/collections.ts";
import { describeError } from "../database/errors.ts";

export const RESUME_SEED_MESSAGE = "[POLLING] Missing input received; resuming workflow";

/** What a single poll tick found */
export type PollOutcome = "resumed" | "waiting" | "retrying" | "idle";

export type ResumeHandler = (caseId: string, seedMessage: string) => Promise<unknown>;

interface PollLoop {
  active: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  polls: number;
}

export class PollingManager implements PollingControl {
  private store: CaseStore;
  private config: OrchestratorConfig;
  private loops = new Map<string, PollLoop>();
  private resumeHandler: ResumeHandler | null = null;

  constructor(store: CaseStore, config: OrchestratorConfig) {
    this.store = store;
    this.config = config;
  }

  /** Register what runs when a parked case's input arrives */
  onResume(handler: ResumeHandler): void {
    this.resumeHandler = handler;
  }

  /**
   * Record (or refresh) the case's pending intervention and make sure a
   * poll loop is running for it.
   */
  async raiseIntervention(
    caseId: string,
    kind: InterventionKind,
    reason: string,
    missingFields: string[],
  ): Promise<InterventionRecord> {
    const { store } = this;
    const record = await store.db.transaction(async (tx) => {
      const pending = await store.getPendingIntervention(caseId, tx);
      const saved = pending
        ? await store.updateIntervention(pending._id, {
          reason,
          missing_fields: missingFields,
          polling_active: true,
        }, tx)
        : await store.createIntervention(caseId, kind, reason, missingFields, tx);
      await store.appendLog(caseId, `[INTERVENTION] ${reason}`, "INTERVENTION", tx);
      return saved;
    });

    this.startLoop(caseId);
    return record;
  }

  /**
   * Run one tick body now. When the input has arrived the resume handler
   * takes over; it resolves the intervention under the case lock. A failed
   * resume leaves the intervention pending and the loop armed.
   */
  async pollOnce(caseId: string): Promise<PollOutcome> {
    const pending = await this.store.getPendingIntervention(caseId);
    if (!pending) {
      this.cancel(caseId);
      return "idle";
    }

    if (!(await this.isSatisfied(pending))) {
      await this.store.appendLog(
        caseId,
        `[POLLING] Still waiting for ${pending.missing_fields.join(", ") || "input"}`,
        "POLLING",
      );
      return "waiting";
    }

    return this.resume(caseId);
  }

  /**
   * Resolve the pending intervention if its input has arrived, without
   * resuming anything. Returns whether it was resolved.
   */
  async resolveIfSatisfied(caseId: string): Promise<boolean> {
    const pending = await this.store.getPendingIntervention(caseId);
    if (!pending || !(await this.isSatisfied(pending))) return false;

    await this.resolve(pending, "input received");
    this.cancel(caseId);
    return true;
  }

  /**
   * Stop the case's loop and clear `polling_active` on its pending record.
   * Safe to call any number of times.
   */
  async stopPolling(caseId: string): Promise<boolean> {
    const wasActive = this.isPolling(caseId);
    this.cancel(caseId);

    const pending = await this.store.getPendingIntervention(caseId);
    if (pending?.polling_active) {
      await this.store.db.transaction(async (tx) => {
        await this.store.updateIntervention(pending._id, { polling_active: false }, tx);
        await this.store.appendLog(caseId, "[POLLING] Polling stopped", "POLLING", tx);
      });
    }
    if (wasActive) console.error(`[polling] Stopped polling for ${caseId}`);
    return wasActive;
  }

  /** Stop the in-memory loop only */
  cancel(caseId: string): void {
    const loop = this.loops.get(caseId);
    if (!loop) return;

    loop.active = false;
    if (loop.timer) clearTimeout(loop.timer);
    loop.timer = null;
    this.loops.delete(caseId);
  }

  isPolling(caseId: string): boolean {
    return this.loops.get(caseId)?.active ?? false;
  }

  activeCaseIds(): string[] {
    return Array.from(this.loops.keys());
  }

  /** Re-arm loops for pending interventions left active by a previous process */
  async recoverLoops(): Promise<string[]> {
    const recovered: string[] = [];
    const pending = await this.store.db.find(COLLECTIONS.interventions, { status: "PENDING" });
    for (const record of pending) {
      if (record.polling_active !== true || typeof record.case_id !== "string") continue;
      this.startLoop(record.case_id);
      recovered.push(record.case_id);
    }
    return recovered;
  }

  /** Stop every loop */
  shutdown(): void {
    for (const caseId of this.activeCaseIds()) this.cancel(caseId);
  }

  // --- Private helpers ---

  private startLoop(caseId: string): void {
    if (this.isPolling(caseId)) return;

    const loop: PollLoop = { active: true, timer: null, polls: 0 };
    this.loops.set(caseId, loop);
    this.arm(caseId, loop);
    console.error(`[polling] Polling ${caseId} every ${this.config.pollIntervalMs}ms`);
  }

  private arm(caseId: string, loop: PollLoop): void {
    if (!loop.active) return;
    loop.timer = setTimeout(() => {
      this.tick(caseId, loop).catch((err: unknown) => {
        console.error(`[polling] Loop for ${caseId} stopped: ${describeError(err)}`);
        this.cancel(caseId);
      });
    }, this.config.pollIntervalMs);
    loop.timer.unref();
  }

  private async tick(caseId: string, loop: PollLoop): Promise<void> {
    if (!loop.active) return;
    loop.timer = null;
    loop.polls++;

    try {
      // A successful resume resolves the intervention, which cancels the loop
      const outcome = await this.pollOnce(caseId);
      if (outcome === "idle") return;
    } catch (err) {
      if (err instanceof CaseNotFoundError) {
        this.cancel(caseId);
        return;
      }
      console.error(`[polling] Tick for ${caseId} failed: ${describeError(err)}`);
    }

    if (!loop.active) return;
    if (loop.polls >= this.config.maxPolls) {
      await this.expire(caseId, loop.polls);
      return;
    }
    this.arm(caseId, loop);
  }

  /** Give up after the poll ceiling; the record stays PENDING */
  private async expire(caseId: string, polls: number): Promise<void> {
    this.cancel(caseId);
    try {
      const pending = await this.store.getPendingIntervention(caseId);
      await this.store.db.transaction(async (tx) => {
        if (pending) {
          await this.store.updateIntervention(pending._id, { polling_active: false }, tx);
        }
        await this.store.appendLog(
          caseId,
          `[POLLING] Gave up after ${polls} polls; intervention left pending`,
          "ERROR",
          tx,
        );
      });
    } catch (err) {
      console.error(`[polling] Could not record expiry for ${caseId}: ${describeError(err)}`);
    }
    console.error(`[polling] Polling for ${caseId} expired after ${polls} polls`);
  }

  private async isSatisfied(intervention: InterventionRecord): Promise<boolean> {
    switch (intervention.intervention_type) {
      case "MISSING_TRANSCRIPT": {
        const found = await this.store.requireCase(intervention.case_id);
        return (found.raw_transcript?.trim().length ?? 0) >= this.config.minTranscriptLength;
      }
    }
  }

  private async resolve(intervention: InterventionRecord, resolution: string): Promise<void> {
    await this.store.db.transaction(async (tx) => {
      await this.store.updateIntervention(intervention._id, {
        status: "RESOLVED",
        polling_active: false,
        resolved_at: new Date().toISOString(),
        resolution,
      }, tx);
      await this.store.appendLog(
        intervention.case_id,
        `[POLLING] Intervention ${intervention.intervention_type} resolved: ${resolution}`,
        "POLLING",
        tx,
      );
    });
  }

  private async resume(caseId: string): Promise<PollOutcome> {
    if (!this.resumeHandler) {
      await this.resolveIfSatisfied(caseId);
      return "resumed";
    }
    try {
      await this.store.appendLog(caseId, RESUME_SEED_MESSAGE, "RESUME");
      await this.resumeHandler(caseId, RESUME_SEED_MESSAGE);
      return "resumed";
    } catch (err) {
      console.error(`[polling] Resume of ${caseId} failed; retrying next tick: ${describeError(err)}`);
      return "retrying";
    }
  }
}
