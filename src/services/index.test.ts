import fs from "fs";
import os from "os";
import path from "path";
import { createGenerator, createServices } from "./index";
import { BuildService } from "./buildService";
import { loadConfig } from "../config";
import { LLMAppGenerator } from "../domain/llmAppGenerator";
import { TemplateAppGenerator } from "../domain/templateAppGenerator";
import { DeploymentStore } from "../stores/deploymentStore";

// Mock OpenAI
jest.mock("openai");

describe("services", () => {
  const createEnv = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
    STUDENT_EMAIL: "student@example.com",
    STUDENT_SECRET: "test-secret",
    GITHUB_TOKEN: "test-token",
    GH_USERNAME: "octo-student",
    ...overrides,
  });

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("createGenerator", () => {
    it("uses the template generator without an OpenAI key", () => {
      expect(createGenerator(loadConfig(createEnv()))).toBeInstanceOf(TemplateAppGenerator);
    });

    it("uses the template generator when the key is blank", () => {
      expect(createGenerator(loadConfig(createEnv({ OPENAI_API_KEY: "   " })))).toBeInstanceOf(TemplateAppGenerator);
    });

    it("uses the OpenAI generator when a key is set", () => {
      expect(createGenerator(loadConfig(createEnv({ OPENAI_API_KEY: "test-openai-key" })))).toBeInstanceOf(
        LLMAppGenerator
      );
    });
  });

  describe("createServices", () => {
    let dataDir: string;

    beforeEach(() => {
      dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "services-"));
    });

    afterEach(() => {
      fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it("wires the build service and a store under DATA_DIR", () => {
      const services = createServices(loadConfig(createEnv({ DATA_DIR: dataDir })));

      expect(services.buildService).toBeInstanceOf(BuildService);
      expect(services.store).toBeInstanceOf(DeploymentStore);
      expect(fs.existsSync(path.join(dataDir, "deployments"))).toBe(true);
    });
  });
});
