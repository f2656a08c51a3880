import { attachmentPathProblem, parseSubmission } from "./submission";
import { ValidationError } from "./errors";

describe("submission", () => {
  const createBody = (overrides: Record<string, unknown> = {}) => ({
    email: "student@example.com",
    secret: "test-secret",
    task: "sum-of-sales",
    round: 1,
    nonce: "nonce-1",
    brief: "Publish a page that sums data.csv sales.",
    checks: ["document.querySelector('#total-sales')"],
    evaluation_url: "https://evaluator.example.com/notify",
    attachments: [{ name: "data.csv", url: "data:text/csv;base64,YSxiCjEsMgo=" }],
    ...overrides,
  });

  describe("parseSubmission", () => {
    it("accepts a complete request", () => {
      const result = parseSubmission(createBody());

      expect(result.task).toBe("sum-of-sales");
      expect(result.round).toBe(1);
      expect(result.attachments).toEqual([
        { name: "data.csv", url: "data:text/csv;base64,YSxiCjEsMgo=" },
      ]);
    });

    it("defaults attachments to an empty list", () => {
      const body = createBody();
      delete (body as Partial<typeof body>).attachments;

      expect(parseSubmission(body).attachments).toEqual([]);
    });

    it("lists every missing field", () => {
      expect.assertions(3);
      try {
        parseSubmission({ email: "student@example.com" });
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        const issues = (error as ValidationError).issues;
        expect(issues).toContain("secret: Required");
        expect(issues).toContain("evaluation_url: Required");
      }
    });

    it("rejects a round below 1", () => {
      expect(() => parseSubmission(createBody({ round: 0 }))).toThrow(ValidationError);
    });

    it("rejects a non-http evaluation URL", () => {
      expect(() => parseSubmission(createBody({ evaluation_url: "ftp://example.com/x" }))).toThrow(
        ValidationError
      );
    });

    it("rejects duplicate attachment names", () => {
      const body = createBody({
        attachments: [
          { name: "data.csv", url: "data:text/csv;base64,YQ==" },
          { name: "data.csv", url: "data:text/csv;base64,Yg==" },
        ],
      });

      expect.assertions(1);
      try {
        parseSubmission(body);
      } catch (error) {
        expect((error as ValidationError).issues).toEqual([
          'attachments.1.name: duplicate attachment name "data.csv"',
        ]);
      }
    });

    it("rejects attachment URLs that are neither data URIs nor http(s)", () => {
      const body = createBody({ attachments: [{ name: "a.txt", url: "file:///etc/hosts" }] });

      expect(() => parseSubmission(body)).toThrow(ValidationError);
    });
  });

  describe("attachmentPathProblem", () => {
    it("accepts plain and nested relative names", () => {
      expect(attachmentPathProblem("data.csv")).toBeNull();
      expect(attachmentPathProblem("assets/logo.png")).toBeNull();
    });

    it("rejects absolute and parent paths", () => {
      expect(attachmentPathProblem("/etc/passwd")).toBe('attachment name "/etc/passwd" must be a relative path');
      expect(attachmentPathProblem("../secret")).toBe(
        'attachment name "../secret" contains an empty or relative segment'
      );
    });

    it("rejects names inside .git", () => {
      expect(attachmentPathProblem(".git/config")).toBe('attachment name ".git/config" points into .git');
    });

    it("rejects names of generated files", () => {
      expect(attachmentPathProblem("index.html")).toBe(
        'attachment name "index.html" collides with a generated file'
      );
    });
  });
});
