import { EvaluationNotifier, NotifierHttp } from "./notifier";
import { EvaluationNotice } from "../domain/submission";

describe("EvaluationNotifier", () => {
  const EVALUATION_URL = "https://evaluator.example.com/notify";

  let mockPost: jest.Mock;
  let sleep: jest.Mock;

  const notice: EvaluationNotice = {
    email: "student@example.com",
    task: "sum-of-sales",
    round: 1,
    nonce: "nonce-1",
    repo_url: "https://github.com/octo-student/tds-sum-of-sales",
    commit_sha: "abc123",
    pages_url: "https://octo-student.github.io/tds-sum-of-sales/",
    latency_ms: 1200,
  };

  const createNotifier = (maxAttempts: number) =>
    new EvaluationNotifier({
      http: { post: mockPost } as unknown as NotifierHttp,
      timeoutMs: 500,
      maxAttempts,
      baseDelayMs: 1000,
      sleep,
    });

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    mockPost = jest.fn();
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("posts the notice once when the evaluator accepts it", async () => {
    mockPost.mockResolvedValue({ status: 200, data: { ok: true } });

    const outcome = await createNotifier(3).notify(EVALUATION_URL, notice);

    expect(outcome).toEqual({ delivered: true, attempts: 1, status: 200, body: { ok: true } });
    expect(mockPost).toHaveBeenCalledWith(EVALUATION_URL, notice, { timeout: 500 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries with exponential backoff", async () => {
    mockPost
      .mockRejectedValueOnce(new Error("Request failed with status code 503"))
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce({ status: 200, data: "" });

    const outcome = await createNotifier(4).notify(EVALUATION_URL, notice);

    expect(outcome).toEqual({ delivered: true, attempts: 3, status: 200, body: "" });
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("reports the last error after every attempt fails", async () => {
    mockPost.mockRejectedValue(new Error("connect ECONNREFUSED"));

    const outcome = await createNotifier(3).notify(EVALUATION_URL, notice);

    expect(outcome).toEqual({ delivered: false, attempts: 3, error: "connect ECONNREFUSED" });
    expect(mockPost).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("makes at least one attempt", async () => {
    mockPost.mockRejectedValue(new Error("boom"));

    const outcome = await createNotifier(0).notify(EVALUATION_URL, notice);

    expect(outcome).toEqual({ delivered: false, attempts: 1, error: "boom" });
  });
});
