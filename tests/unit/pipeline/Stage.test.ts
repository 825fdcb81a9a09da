/**
 * Unit tests for the stage contract and runner
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { NoOpStage } from "../../../src/pipeline/Stage.js";
import { EnrichmentStage, TransformationStage } from "../../../src/pipeline/stages/index.js";
import { EmbeddingRateLimitError } from "../../../src/providers/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { ScriptedStage, makeContext, makeEntity, makeRelation } from "../../helpers/pipeline-fakes.js";

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("Stage.run", () => {
  test("returns a completed result with timing", async () => {
    const stage = new ScriptedStage("Counting");

    const result = await stage.run(makeContext());

    expect(result.stageName).toBe("Counting");
    expect(result.status).toBe("completed");
    expect(result.outputData).toEqual({ ran: true });
    expect(result.error).toBeUndefined();
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(result.timestamp).toBeInstanceOf(Date);
  });

  test("a disabled stage is skipped without running", async () => {
    const stage = new ScriptedStage("Counting");
    stage.disable();

    const result = await stage.run(makeContext());

    expect(stage.enabled).toBe(false);
    expect(result.status).toBe("skipped");
    expect(result.metadata).toEqual({ reason: "disabled" });
    expect(stage.runs).toBe(0);
  });

  test("enable turns a disabled stage back on", async () => {
    const stage = new ScriptedStage("Counting");
    stage.disable();
    stage.enable();

    expect((await stage.run(makeContext())).status).toBe("completed");
  });

  test("a thrown error becomes a failed result with the message verbatim", async () => {
    const result = await new ScriptedStage("Counting", "throw").run(makeContext());

    expect(result.status).toBe("failed");
    expect(result.error).toBe("Counting exploded");
    expect(result.metadata).toEqual({ exceptionType: "Error" });
  });

  test("collaborator errors add their code and retryability", async () => {
    const stage = new ScriptedStage("Embedding", async () => {
      throw new EmbeddingRateLimitError("Rate limit exceeded", 1000);
    });

    const result = await stage.run(makeContext());

    expect(result.error).toBe("Rate limit exceeded");
    expect(result.metadata).toEqual({
      exceptionType: "EmbeddingRateLimitError",
      errorCode: "RATE_LIMIT_ERROR",
      collaborator: "embedding",
      retryable: true,
    });
  });

  test("non-Error throws are reported by type", async () => {
    const stage = new ScriptedStage("Odd", async () => {
      throw "plain text";
    });

    const result = await stage.run(makeContext());

    expect(result.error).toBe("plain text");
    expect(result.metadata).toEqual({ exceptionType: "string" });
  });

  test("a failed result without a message gets one", async () => {
    const stage = new ScriptedStage("Quiet", async () => ({
      stageName: "Quiet",
      status: "failed",
      durationMs: 0,
      error: "",
      metadata: {},
      timestamp: new Date(),
    }));

    expect((await stage.run(makeContext())).error).toBe("Quiet stage failed");
  });

  test("scripted skips carry their reason", async () => {
    const result = await new ScriptedStage("Maybe", "skip").run(makeContext());

    expect(result.status).toBe("skipped");
    expect(result.metadata).toEqual({ reason: "scripted" });
  });
});

describe("NoOpStage", () => {
  test("completes tagged noop without touching the context", async () => {
    const stage = new TransformationStage();
    const context = makeContext();
    context.entities = [makeEntity("Person", "Tom Hanks")];

    const result = await stage.run(context);

    expect(stage).toBeInstanceOf(NoOpStage);
    expect(stage.kind).toBe("noop");
    expect(result.status).toBe("completed");
    expect(result.metadata).toEqual({ noop: true });
    expect(context.enrichedEntities).toBeNull();
    expect(context.finalEntities()).toEqual([makeEntity("Person", "Tom Hanks")]);
  });

  test("enrichment passes entities and relations through", async () => {
    const context = makeContext();
    context.entities = [makeEntity("Person", "Tom Hanks"), makeEntity("Movie", "Big")];
    context.relations = [makeRelation("ACTED_IN", "Tom Hanks", "Big")];

    await new EnrichmentStage().run(context);

    expect(context.enrichedEntities).toEqual(context.entities);
    expect(context.enrichedEntities).not.toBe(context.entities);
    expect(context.finalRelations()).toEqual([makeRelation("ACTED_IN", "Tom Hanks", "Big")]);
  });

  test("refuses to run after the deadline", async () => {
    const context = makeContext();
    const controller = new AbortController();
    controller.abort();
    context.signal = controller.signal;

    const result = await new EnrichmentStage().run(context);

    expect(result.status).toBe("failed");
    expect(result.error).toBe("Pipeline run was aborted");
    expect(context.enrichedEntities).toBeNull();
  });
});
