import path from "path";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  const createEnv = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
    STUDENT_EMAIL: "student@example.com",
    STUDENT_SECRET: "test-secret",
    GITHUB_TOKEN: "test-token",
    GH_USERNAME: "octo-student",
    ...overrides,
  });

  it("applies defaults", () => {
    const config = loadConfig(createEnv());

    expect(config).toEqual({
      studentEmail: "student@example.com",
      studentSecret: "test-secret",
      githubToken: "test-token",
      githubUsername: "octo-student",
      repoPrefix: "tds-",
      openaiApiKey: null,
      openaiModel: "gpt-4o-mini",
      port: 3001,
      httpTimeoutMs: 20000,
      notifyRetries: 3,
      dataDir: path.resolve("data"),
    });
  });

  it("reads optional settings", () => {
    const config = loadConfig(
      createEnv({
        GH_REPO_PREFIX: "proj-",
        OPENAI_API_KEY: " test-openai-key ",
        OPENAI_MODEL: "gpt-4o",
        API_PORT: "8080",
        HTTP_TIMEOUT: "2.5",
        NOTIFY_RETRIES: "5",
        DATA_DIR: "/tmp/deployer",
      })
    );

    expect(config.repoPrefix).toBe("proj-");
    expect(config.openaiApiKey).toBe("test-openai-key");
    expect(config.openaiModel).toBe("gpt-4o");
    expect(config.port).toBe(8080);
    expect(config.httpTimeoutMs).toBe(2500);
    expect(config.notifyRetries).toBe(5);
    expect(config.dataDir).toBe("/tmp/deployer");
  });

  it("keeps an explicitly empty repository prefix", () => {
    const config = loadConfig(createEnv({ GH_REPO_PREFIX: "" }));

    expect(config.repoPrefix).toBe("");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig(createEnv({ OPENAI_API_KEY: "", API_PORT: "  " }));

    expect(config.openaiApiKey).toBeNull();
    expect(config.port).toBe(3001);
  });

  it("requires GitHub credentials", () => {
    expect(() => loadConfig(createEnv({ GITHUB_TOKEN: undefined, GH_USERNAME: "" }))).toThrow(
      /^Invalid configuration: GITHUB_TOKEN: .*; GH_USERNAME: /
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig(createEnv({ API_PORT: "abc" }))).toThrow(/API_PORT/);
  });
});
