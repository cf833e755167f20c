import type { Logger } from "pino";
import { redactEmail } from "../logger.js";
import {
  buildLetter,
  sendMail,
  type MailConfig,
  type MailKind,
  type SendMailOptions,
} from "./email.js";

export interface MailJob {
  to: string;
  tokenString: string;
  kind: MailKind;
}

export type MailSender = (
  options: SendMailOptions,
) => Promise<{ sent: boolean; error?: string }>;

/**
 * In-process outbox. Handlers enqueue after their transaction commits and do
 * not wait; one worker sends jobs in order. A failed send is logged and dropped.
 */
export class MailQueue {
  private readonly config: MailConfig;
  private readonly log: Logger;
  private readonly send: MailSender;
  private readonly jobs: MailJob[] = [];
  private running: Promise<void> | null = null;

  constructor(config: MailConfig, log: Logger, send?: MailSender) {
    this.config = config;
    this.log = log;
    this.send = send ?? ((options) => sendMail(config, log, options));
  }

  get pending(): number {
    return this.jobs.length;
  }

  enqueue(job: MailJob): void {
    this.jobs.push(job);
    this.kick();
  }

  private kick(): void {
    if (this.running || this.jobs.length === 0) return;
    this.running = this.work().finally(() => {
      this.running = null;
      this.kick();
    });
  }

  /** Resolves once every queued job has been attempted. */
  async drain(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private async work(): Promise<void> {
    for (let job = this.jobs.shift(); job; job = this.jobs.shift()) {
      await this.deliver(job);
    }
  }

  private async deliver(job: MailJob): Promise<void> {
    const emailRedacted = redactEmail(job.to);
    try {
      const letter = buildLetter(this.config, job.kind, job.tokenString);
      const result = await this.send({ to: job.to, ...letter });
      if (result.error) {
        this.log.warn({ emailRedacted, kind: job.kind, err: result.error }, "Mail not sent");
      } else if (result.sent) {
        this.log.debug({ emailRedacted, kind: job.kind }, "Mail sent");
      }
    } catch (err) {
      this.log.warn({ emailRedacted, kind: job.kind, err }, "Mail not sent");
    }
  }
}
