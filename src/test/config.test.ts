import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { loadConfig, parseAllowedOrigins, requireSetting } from "../config/env";
import { ConfigError, getErrorMessage, preview } from "../utils/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    assert.equal(config.PORT, 8000);
    assert.equal(config.CHAT_MODEL, "gemini-2.5-flash");
    assert.equal(config.LLM_TEMPERATURE, 0.3);
    assert.equal(config.LLM_MAX_TOKENS, 1200);
    assert.equal(config.EMBEDDING_DIMENSIONS, 768);
    assert.equal(config.PINECONE_INDEX_NAME, "medical-knowledge");
    assert.equal(config.PINECONE_NAMESPACE, "");
    assert.equal(config.AGENT_MAX_STEPS, 10);
    assert.equal(config.HISTORY_TURNS, 5);
    assert.equal(config.HISTORY_LIMIT, 10);
    assert.equal(config.GEMINI_API_KEY, undefined);
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ PORT: "3001", LLM_TEMPERATURE: "0.7", HISTORY_TURNS: "0" });
    assert.equal(config.PORT, 3001);
    assert.equal(config.LLM_TEMPERATURE, 0.7);
    assert.equal(config.HISTORY_TURNS, 0);
  });

  it("treats blank keys as unset", () => {
    const config = loadConfig({ MONGODB_URI: "", BRAVE_API_KEY: "   ", GEMINI_API_KEY: " test-secret " });
    assert.equal(config.MONGODB_URI, undefined);
    assert.equal(config.BRAVE_API_KEY, undefined);
    assert.equal(config.GEMINI_API_KEY, "test-secret");
  });

  it("rejects invalid values with a ConfigError naming the variable", () => {
    assert.throws(
      () => loadConfig({ PORT: "not-a-port" }),
      (error: unknown) =>
        error instanceof ConfigError && error.message.startsWith("Invalid environment configuration: PORT")
    );
  });
});

describe("requireSetting", () => {
  it("returns a configured key", () => {
    const config = loadConfig({ PINECONE_API_KEY: "test-secret" });
    assert.equal(requireSetting(config, "PINECONE_API_KEY"), "test-secret");
  });

  it("throws when the key is missing", () => {
    assert.throws(() => requireSetting(loadConfig({}), "GEMINI_API_KEY"), {
      name: "ConfigError",
      message: "GEMINI_API_KEY is required. Add it to your .env file.",
    });
  });
});

describe("parseAllowedOrigins", () => {
  it("splits and trims the list", () => {
    assert.deepEqual(parseAllowedOrigins("http://a.test, http://b.test ,"), [
      "http://a.test",
      "http://b.test",
    ]);
  });
});

describe("error helpers", () => {
  it("getErrorMessage handles errors, strings and objects", () => {
    assert.equal(getErrorMessage(new Error("boom")), "boom");
    assert.equal(getErrorMessage("plain"), "plain");
    assert.equal(getErrorMessage({ code: 42 }), '{"code":42}');
  });

  it("preview truncates long text", () => {
    assert.equal(preview("short"), "short");
    assert.equal(preview("abcdef", 3), "abc...");
  });
});
