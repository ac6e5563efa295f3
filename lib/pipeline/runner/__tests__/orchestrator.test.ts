import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "../../core/errors";
import {
  blockSchema,
  cleanedDocumentSchema,
  generationFailureSchema,
  pageRecordSchema,
  pipelineSettingsSchema,
  qaRecordSchema,
  taggedBlockSchema,
  type PageRecord,
} from "../../core/schemas";
import type { QaBatch } from "../../core/types";
import { cleanPages } from "../../cleaning/cleaner";
import { sliceDocument } from "../../slicing/slicer";
import { tagBlock } from "../../tagging/role-classifier";
import { executeRun } from "../orchestrator";
import { createCallbackProgress, type PipelineDeps, type Progress, type ProgressEvent } from "../types";
import { artifactPath, hasArtifact, readArtifact, readRunRecord, STATS_FILE } from "../workspace";

const BOTOX = "Botox costs $300 per session and lasts 3-4 months.";

const PAGE: PageRecord = {
  source_url: "https://example.com/botox",
  page_type: "general",
  segments: [{ kind: "paragraph", text: BOTOX }],
  fetched_at: "2024-03-01T12:00:00.000Z",
};

const REQUEST = {
  source_url: "https://example.com/botox",
  max_pages: 1,
  delay_seconds: 0,
  max_block_chars: 40,
  min_block_chars: 10,
};

const settings = pipelineSettingsSchema.parse({});

function makeDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps & { batches: QaBatch[] } {
  const batches: QaBatch[] = [];
  return {
    batches,
    fetchPages: async () => ({ pages: [PAGE], warnings: [], requested: 1 }),
    cleanPages,
    sliceDocument,
    tagBlock: (block) => tagBlock(block),
    createGenerator: () => ({
      async generate(batch) {
        batches.push(batch);
        return [{ question: "How much does Botox cost?", answer: "$300 per session." }];
      },
    }),
    ...overrides,
  };
}

function recordEvents(): { progress: Progress; events: ProgressEvent[] } {
  const events: ProgressEvent[] = [];
  return { progress: { emit: (event) => events.push(event) }, events };
}

describe("executeRun", () => {
  let runsRoot: string;

  beforeEach(() => {
    runsRoot = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrator-test-"));
  });

  afterEach(() => {
    fs.rmSync(runsRoot, { recursive: true, force: true });
  });

  it("runs the Botox page end to end", async () => {
    const deps = makeDeps();
    const { progress, events } = recordEvents();

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps, progress });
    const runDir = path.join(runsRoot, record.run_id);

    expect(record.state).toBe("COMPLETE");
    expect(record.stages.map((s) => `${s.name}:${s.status}`)).toEqual([
      "fetch:succeeded",
      "clean:succeeded",
      "slice:succeeded",
      "tag:succeeded",
      "generate:succeeded",
    ]);

    const sliced = readArtifact(runDir, "sliced", blockSchema).records;
    expect(sliced).toHaveLength(1);
    expect(sliced[0].text).toBe(BOTOX);
    expect(sliced[0].text).toContain("$300");
    expect(sliced[0].text).toContain("3-4 months");

    const tagged = readArtifact(runDir, "tagged", taggedBlockSchema).records;
    expect(tagged[0].role).toBe("TRANSACTIONAL");
    expect(tagged[0].matched_rule).toBe("transactional:$");

    expect(deps.batches).toEqual([
      {
        sourceUrl: "https://example.com/botox",
        pageType: "general",
        ordinals: [0],
        texts: [BOTOX],
      },
    ]);
    expect(readArtifact(runDir, "qa", qaRecordSchema).records).toEqual([
      {
        source_url: "https://example.com/botox",
        page_type: "general",
        question: "How much does Botox cost?",
        answer: "$300 per session.",
      },
    ]);
    expect(fs.readFileSync(artifactPath(runDir, "qa_failures"), "utf-8")).toBe("");

    expect(events.filter((e) => e.type !== "stage-progress").map((e) => e.type)).toEqual([
      "run-start",
      "stage-start",
      "stage-complete",
      "stage-start",
      "stage-complete",
      "stage-start",
      "stage-complete",
      "stage-start",
      "stage-complete",
      "stage-start",
      "stage-complete",
      "run-complete",
    ]);
  });

  it("persists run.json and stats.json on completion", async () => {
    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps: makeDeps() });
    const runDir = path.join(runsRoot, record.run_id);

    const persisted = readRunRecord(runDir);
    expect(persisted?.state).toBe("COMPLETE");
    expect(persisted?.request).toEqual(REQUEST);
    expect(persisted?.finished_at).toBeDefined();

    const stats = JSON.parse(fs.readFileSync(path.join(runDir, STATS_FILE), "utf-8"));
    expect(stats).toEqual(record.stats);
    expect(record.stats?.artifacts).toEqual({
      raw: 1,
      clean: 1,
      sliced: 1,
      tagged: 1,
      qa: 1,
      qa_failures: 0,
    });
    expect(record.stats?.roles.TRANSACTIONAL).toBe(1);
    expect(record.stats?.flags).toEqual({ price: 1, measurement: 0, temporal: 1, warning: 0 });
    expect(record.stats?.overflow_blocks).toBe(1);
  });

  it("stops at the failing stage and keeps earlier artifacts", async () => {
    const deps = makeDeps({
      sliceDocument: () => {
        throw new Error("slicer exploded");
      },
    });
    const { progress, events } = recordEvents();

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps, progress });
    const runDir = path.join(runsRoot, record.run_id);

    expect(record.state).toBe("FAILED");
    expect(record.failure).toEqual({
      stage: "slice",
      state: "SLICING",
      kind: "StageError",
      error: "slicer exploded",
    });
    expect(record.stages.map((s) => `${s.name}:${s.status}`)).toEqual([
      "fetch:succeeded",
      "clean:succeeded",
      "slice:failed",
    ]);
    expect(record.stages[2].artifact).toBeNull();

    expect(readArtifact(runDir, "raw", pageRecordSchema).records).toHaveLength(1);
    expect(readArtifact(runDir, "clean", cleanedDocumentSchema).records).toHaveLength(1);
    expect(hasArtifact(runDir, "sliced")).toBe(false);
    expect(hasArtifact(runDir, "tagged")).toBe(false);
    expect(fs.existsSync(path.join(runDir, STATS_FILE))).toBe(false);

    expect(readRunRecord(runDir)?.state).toBe("FAILED");
    expect(events.slice(-2)).toEqual([
      { type: "stage-error", runId: record.run_id, stage: "slice", error: "slicer exploded" },
      { type: "run-failed", runId: record.run_id, stage: "slice", error: "slicer exploded" },
    ]);
    expect(deps.batches).toEqual([]);
  });

  it("fails the fetch stage when no page could be fetched", async () => {
    const deps = makeDeps({
      fetchPages: async () => ({
        pages: [],
        warnings: ["https://example.com/botox: HTTP 404"],
        requested: 1,
      }),
    });

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps });

    expect(record.state).toBe("FAILED");
    expect(record.failure?.state).toBe("FETCHING");
    expect(record.failure?.error).toBe(
      "No pages fetched from https://example.com/botox: https://example.com/botox: HTTP 404"
    );
    expect(hasArtifact(path.join(runsRoot, record.run_id), "raw")).toBe(false);
  });

  it("fails at generate when stats cannot be written, never COMPLETE on disk", async () => {
    const { progress, events } = recordEvents();
    const record = await executeRun({
      runsRoot,
      request: REQUEST,
      settings,
      deps: makeDeps(),
      progress,
      onCreated: (_runId, runDir) => fs.mkdirSync(path.join(runDir, STATS_FILE)),
    });
    const runDir = path.join(runsRoot, record.run_id);

    expect(record.state).toBe("FAILED");
    expect(record.failure?.stage).toBe("generate");
    expect(record.failure?.state).toBe("GENERATING");
    expect(record.failure?.kind).toBe("StageError");
    expect(record.stats).toBeUndefined();
    expect(record.finished_at).toBeDefined();

    const persisted = readRunRecord(runDir);
    expect(persisted?.state).toBe("FAILED");
    expect(persisted?.stats).toBeUndefined();
    expect(persisted?.failure?.stage).toBe("generate");
    expect(events.map((e) => e.type).slice(-2)).toEqual(["stage-error", "run-failed"]);
  });

  it("fails with UpstreamArtifactMissing when a stage's input is gone", async () => {
    const progress: Progress = {
      emit: (event) => {
        if (event.type === "stage-start" && event.stage === "tag") {
          fs.rmSync(artifactPath(path.join(runsRoot, event.runId), "sliced"));
        }
      },
    };

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps: makeDeps(), progress });

    expect(record.state).toBe("FAILED");
    expect(record.failure).toEqual({
      stage: "tag",
      state: "TAGGING",
      kind: "UpstreamArtifactMissing",
      error: 'Upstream artifact "sliced" unusable: sliced.jsonl not found',
    });
    expect(readRunRecord(path.join(runsRoot, record.run_id))?.state).toBe("FAILED");
  });

  it("fails with UpstreamArtifactMissing when no tagged line is valid", async () => {
    const deps = makeDeps({
      tagBlock: (block) => ({
        ...block,
        role: "TRANSACTIONAL",
        matched_rule: "transactional:$",
        confidence: 5,
      }),
    });

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps });

    expect(record.state).toBe("FAILED");
    expect(record.failure).toEqual({
      stage: "generate",
      state: "GENERATING",
      kind: "UpstreamArtifactMissing",
      error: 'Upstream artifact "tagged" unusable: none of 1 lines in tagged.jsonl is a valid record',
    });
    expect(deps.batches).toEqual([]);
  });

  it("refuses to overwrite an artifact that already exists", async () => {
    const record = await executeRun({
      runsRoot,
      request: REQUEST,
      settings,
      deps: makeDeps(),
      onCreated: (_runId, runDir) => fs.mkdirSync(artifactPath(runDir, "sliced")),
    });
    const runDir = path.join(runsRoot, record.run_id);

    expect(record.state).toBe("FAILED");
    expect(record.failure).toEqual({
      stage: "slice",
      state: "SLICING",
      kind: "ArtifactExists",
      error: `Refusing to overwrite existing artifact: ${artifactPath(runDir, "sliced")}`,
    });
    expect(hasArtifact(runDir, "tagged")).toBe(false);
  });

  it("records a frozen copy of the settings", async () => {
    const own = pipelineSettingsSchema.parse({});
    const record = await executeRun({ runsRoot, request: REQUEST, settings: own, deps: makeDeps() });

    own.slicing.degenerate_policy = "review";
    own.generation.roles.push("GENERAL");

    expect(record.settings.slicing.degenerate_policy).toBe("annotate");
    expect(record.settings.generation.roles).toEqual([
      "DESCRIPTIVE",
      "PROCEDURAL",
      "TEMPORAL",
      "TRANSACTIONAL",
    ]);
    expect(Object.isFrozen(record.settings)).toBe(true);
    expect(Object.isFrozen(record.settings.generation.roles)).toBe(true);
    expect(() => record.settings.generation.roles.push("GENERAL")).toThrow(TypeError);
    expect(readRunRecord(path.join(runsRoot, record.run_id))?.settings.slicing.degenerate_policy).toBe(
      "annotate"
    );
  });

  it("records failed generation batches without failing the run", async () => {
    const deps = makeDeps({
      createGenerator: () => ({
        generate: async () => {
          throw new Error("rate limited");
        },
      }),
    });

    const record = await executeRun({ runsRoot, request: REQUEST, settings, deps });
    const runDir = path.join(runsRoot, record.run_id);

    expect(record.state).toBe("COMPLETE");
    expect(record.warnings).toEqual(["1 of 1 generation batches failed"]);
    expect(readArtifact(runDir, "qa_failures", generationFailureSchema).records).toEqual([
      {
        source_url: "https://example.com/botox",
        page_type: "general",
        ordinals: [0],
        error: "GenerationError",
        message: "rate limited",
      },
    ]);
    expect(record.stats?.generation_failures).toBe(1);
  });

  it("rejects an invalid request before creating a workspace", async () => {
    await expect(
      executeRun({
        runsRoot,
        request: { ...REQUEST, source_url: "ftp://example.com", min_block_chars: 80 },
        settings,
        deps: makeDeps(),
      })
    ).rejects.toThrow(ConfigurationError);
    expect(fs.readdirSync(runsRoot)).toEqual([]);
  });

  it("keeps concurrent runs in separate workspaces", async () => {
    const messages: string[] = [];
    const [a, b] = await Promise.all([
      executeRun({ runsRoot, request: REQUEST, settings, deps: makeDeps() }),
      executeRun({
        runsRoot,
        request: { ...REQUEST, source_url: "https://example.com/other" },
        settings,
        deps: makeDeps(),
        progress: createCallbackProgress((m) => messages.push(m)),
      }),
    ]);

    expect(a.run_id).not.toBe(b.run_id);
    expect(fs.readdirSync(runsRoot).sort()).toEqual([a.run_id, b.run_id].sort());
    expect(readRunRecord(path.join(runsRoot, a.run_id))?.request.source_url).toBe(
      "https://example.com/botox"
    );
    expect(readRunRecord(path.join(runsRoot, b.run_id))?.request.source_url).toBe(
      "https://example.com/other"
    );
    expect(messages[0]).toBe("Starting run for https://example.com/other");
    expect(messages[messages.length - 1]).toBe("Run complete");
  });

  it("reports the workspace before the first stage", async () => {
    let created: string | undefined;
    const record = await executeRun({
      runsRoot,
      request: REQUEST,
      settings,
      deps: makeDeps({
        fetchPages: async () => {
          expect(created).toBeDefined();
          return { pages: [PAGE], warnings: [], requested: 1 };
        },
      }),
      onCreated: (runId) => {
        created = runId;
      },
    });
    expect(created).toBe(record.run_id);
  });
});
