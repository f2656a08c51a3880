import axios, { AxiosInstance } from "axios";
import { EvaluationNotice } from "../domain/submission";
import { errorMessage } from "../domain/errors";

export type NotificationOutcome =
  | { delivered: true; attempts: number; status: number; body: unknown }
  | { delivered: false; attempts: number; error: string };

export interface Notifier {
  notify(url: string, notice: EvaluationNotice): Promise<NotificationOutcome>;
}

export type NotifierHttp = Pick<AxiosInstance, "post">;

export interface EvaluationNotifierOptions {
  http?: NotifierHttp;
  timeoutMs?: number;
  /** Total attempts, including the first. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles after each failure. */
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Posts the completion notice to the evaluation URL.
 *
 * Never throws: a notice that cannot be delivered after every attempt is
 * reported in the outcome and logged.
 */
export class EvaluationNotifier implements Notifier {
  private http: NotifierHttp;
  private timeoutMs: number;
  private maxAttempts: number;
  private baseDelayMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: EvaluationNotifierOptions = {}) {
    this.http = options.http ?? axios;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.sleep = options.sleep ?? wait;
  }

  async notify(url: string, notice: EvaluationNotice): Promise<NotificationOutcome> {
    let lastError = "";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.http.post<unknown>(url, notice, { timeout: this.timeoutMs });
        console.log(`[notify] ${notice.task} round ${notice.round} delivered (${response.status})`);
        return { delivered: true, attempts: attempt, status: response.status, body: response.data };
      } catch (error) {
        lastError = errorMessage(error);
        console.error(`[notify] Attempt ${attempt}/${this.maxAttempts} to ${url} failed: ${lastError}`);
      }

      if (attempt < this.maxAttempts) {
        await this.sleep(this.baseDelayMs * 2 ** (attempt - 1));
      }
    }

    return { delivered: false, attempts: this.maxAttempts, error: lastError };
  }
}
