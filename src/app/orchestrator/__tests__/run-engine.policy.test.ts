import fse from "fs-extra";
import { describe, expect, it } from "vitest";

import { FailureLog } from "../../../core/failure-log.js";
import { createAndRunTask, createTaskOnly, resumeTask } from "../run/run-engine.js";

import { FakeWorld, FIXED_ISO } from "./fakes.js";
import {
  buildSettings,
  inputFor,
  readLogEvents,
  readStatuses,
  recordTransitions,
  registerRunEngineTestHooks,
  runWithStore,
  setupWorkspace,
} from "./run-engine.test-kit.js";

registerRunEngineTestHooks();

// =============================================================================
// VERIFY AND FIXUP
// =============================================================================

describe("verification retries", () => {
  it("runs a fixup per failed verification until verification passes", async () => {
    const workspace = await setupWorkspace("run-engine-retries-");
    const world = new FakeWorld();
    const recorder = recordTransitions();
    world.executor.queueVerify(
      "npm test -- src/a.ts",
      { passed: false, output: "1 failing" },
      { passed: false, output: "2 failing" },
    );

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}", maxRetries: 2 }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
      onTransition: recorder.onTransition,
    });

    expect(recorder.linesFor("src/a.ts")).toEqual([
      "pending -> prompt_in_progress (0)",
      "prompt_in_progress -> awaiting_verification (0)",
      "awaiting_verification -> verify_in_progress (0)",
      "verify_in_progress -> fixup_in_progress (1)",
      "fixup_in_progress -> awaiting_verification (1)",
      "awaiting_verification -> verify_in_progress (1)",
      "verify_in_progress -> fixup_in_progress (2)",
      "fixup_in_progress -> awaiting_verification (2)",
      "awaiting_verification -> verify_in_progress (2)",
      "verify_in_progress -> completed (2)",
    ]);
    expect(result.summary.files[0]?.status).toBe("completed");
    expect(world.executor.verifyCalls).toEqual([
      "npm test -- src/a.ts",
      "npm test -- src/a.ts",
      "npm test -- src/a.ts",
    ]);

    const fixup = world.executor.runCalls[1]?.promptText ?? "";
    expect(fixup.startsWith("Fix the issues with the file\n")).toBe(true);
    expect(fixup).toContain("Verification failed with this output:\n```\n1 failing\n```");
    expect(world.executor.runCalls[2]?.promptText).toContain("```\n2 failing\n```");
  });

  it("fails on the first verification failure when max retries is zero", async () => {
    const workspace = await setupWorkspace("run-engine-no-retries-");
    const world = new FakeWorld();
    const recorder = recordTransitions();
    world.executor.queueVerify("npm test -- src/a.ts", { passed: false, output: "1 failing" });

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}", maxRetries: 0 }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
      onTransition: recorder.onTransition,
    });

    expect(recorder.linesFor("src/a.ts")).toEqual([
      "pending -> prompt_in_progress (0)",
      "prompt_in_progress -> awaiting_verification (0)",
      "awaiting_verification -> verify_in_progress (0)",
      "verify_in_progress -> failed (0)",
    ]);
    expect(world.executor.runCalls).toHaveLength(1);
    expect(result.summary.files[0]?.lastError).toBe("1 failing");

    const transition = (await readLogEvents(workspace)).find(
      (event) => event.type === "file.transition" && event.payload?.to === "failed",
    );
    expect(transition?.payload).toEqual({
      from: "verify_in_progress",
      to: "failed",
      retry_count: 0,
      last_error: "1 failing",
    });
  });

  it("uses the custom fixup prompt", async () => {
    const workspace = await setupWorkspace("run-engine-fixup-prompt-");
    const world = new FakeWorld();
    world.executor.queueVerify("tsc src/a.ts", { passed: false, output: "TS2322" });

    await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "tsc {file}", fixupPrompt: "Repair {file_name}" }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });

    expect(world.executor.runCalls[1]?.promptText.split("\n")[0]).toBe("Repair a.ts");
  });

  it("writes verification output, fixups and the final verdict to the failure log", async () => {
    const workspace = await setupWorkspace("run-engine-failure-log-");
    const world = new FakeWorld();
    world.executor.queueVerify(
      "npm test -- src/a.ts",
      { passed: false, output: "1 failing" },
      { passed: false, output: "still failing" },
    );
    world.executor.queueRun(
      "src/a.ts",
      { success: true, output: 'RESULT: "done"' },
      { success: true, output: "tried a fix" },
    );

    await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}", maxRetries: 1 }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });

    const logPath = new FailureLog(workspace.paths, "task_0").pathFor("src/a.ts");
    const log = await fse.readFile(logPath, "utf8");
    expect(log).toContain(
      `[${FIXED_ISO}]\nVERIFICATION FAILED (retries used 1/1)\nCommand: npm test -- src/a.ts\n\nOutput:\n1 failing\n`,
    );
    expect(log).toContain("FIXUP PROMPT SENT:\nFix the issues with the file\n");
    expect(log).toContain("FIXUP RESPONSE:\ntried a fix\n");
    expect(log).toContain(
      "VERIFICATION FAILED (retries used 1/1)\nCommand: npm test -- src/a.ts\n\nOutput:\nstill failing\n",
    );
    expect(log).toContain("FINAL STATUS: FAILED\nstill failing\n");
  });
});

// =============================================================================
// ALLOWLIST GUARD
// =============================================================================

describe("allowlist guard", () => {
  it("fails a file whose prompt touched files outside every allowlist", async () => {
    const workspace = await setupWorkspace("run-engine-guard-");
    const world = new FakeWorld({ trackChanges: true });
    world.executor.onRun = (call) => {
      world.tracker.touch(call.filePath, "config/secrets.env");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}" }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });

    expect(result.summary.files).toEqual([
      {
        path: "src/a.ts",
        status: "failed",
        retryCount: 0,
        lastError: "Unauthorized changes outside allowlist: config/secrets.env",
      },
    ]);
    expect(world.executor.verifyCalls).toEqual([]);
  });

  it("ignores files that were already dirty when the task was created", async () => {
    const workspace = await setupWorkspace("run-engine-baseline-");
    const world = new FakeWorld({ trackChanges: true, baseline: ["config/secrets.env"] });
    world.executor.onRun = (call) => {
      world.tracker.touch(call.filePath, "config/secrets.env");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings(),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });

    expect(result.summary.files[0]?.status).toBe("completed");
  });

  it("allows edits inside another file's allowlist", async () => {
    const workspace = await setupWorkspace("run-engine-siblings-");
    const world = new FakeWorld({ trackChanges: true });
    world.executor.onRun = (call) => {
      if (call.filePath === "src/a.ts") world.tracker.touch("src/a.test.ts", "src/b.test.ts");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings(),
      input: inputFor("src/a.ts", "src/b.ts"),
      portsFactory: world.ports(),
    });

    expect(result.summary.counts.completed).toBe(2);
  });

  it("allows a route file to edit its own test despite brackets in its name", async () => {
    const workspace = await setupWorkspace("run-engine-route-");
    const world = new FakeWorld({ trackChanges: true });
    world.executor.onRun = (call) => {
      world.tracker.touch(call.filePath, "pages/[slug].test.tsx");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings(),
      input: inputFor("pages/[slug].tsx"),
      portsFactory: world.ports(),
    });

    expect(result.summary.files[0]?.status).toBe("completed");
  });

  it("fails a file whose fixup touched files outside the allowlist", async () => {
    const workspace = await setupWorkspace("run-engine-guard-fixup-");
    const world = new FakeWorld({ trackChanges: true });
    world.executor.queueVerify("npm test -- src/a.ts", { passed: false, output: "1 failing" });
    world.executor.onRun = (call) => {
      if (call.promptText.startsWith("Fix the issues")) world.tracker.touch("package.json");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}" }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });

    expect(result.summary.files).toEqual([
      {
        path: "src/a.ts",
        status: "failed",
        retryCount: 1,
        lastError: "Unauthorized changes outside allowlist: package.json",
      },
    ]);
    expect(world.executor.verifyCalls).toHaveLength(1);
  });
});

// =============================================================================
// GRACEFUL STOP
// =============================================================================

describe("graceful stop", () => {
  it("lets in-flight steps finish and claims nothing new", async () => {
    const workspace = await setupWorkspace("run-engine-stop-");
    const world = new FakeWorld();
    const controller = new AbortController();
    world.executor.onRun = () => {
      controller.abort("SIGINT");
    };

    const result = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}" }),
      input: inputFor("src/a.ts", "src/b.ts"),
      portsFactory: world.ports(),
      stopSignal: controller.signal,
    });

    expect(result.done).toBe(false);
    expect(result.stopped).toEqual({ reason: "signal", signal: "SIGINT" });
    expect(world.executor.runCalls.map((call) => call.filePath)).toEqual(["src/a.ts"]);
    expect(world.executor.verifyCalls).toEqual([]);
    expect(await readStatuses(workspace)).toEqual({
      "src/a.ts": { status: "awaiting_verification", retries: 0 },
      "src/b.ts": { status: "pending", retries: 0 },
    });

    const stop = (await readLogEvents(workspace)).find((event) => event.type === "task.stop");
    expect(stop?.payload).toEqual({ reason: "signal", remaining_files: 2, signal: "SIGINT" });
  });

  it("runs the fixup a failed verification entered before honouring a stop", async () => {
    const workspace = await setupWorkspace("run-engine-stop-fixup-");
    const world = new FakeWorld();
    const controller = new AbortController();
    world.executor.queueVerify("npm test -- src/a.ts", { passed: false, output: "1 failing" });
    world.executor.onVerify = () => {
      controller.abort("SIGTERM");
    };

    const stopped = await createAndRunTask({
      ...workspace,
      settings: buildSettings({ verifyCommand: "npm test -- {file}" }),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
      stopSignal: controller.signal,
    });

    expect(stopped.stopped?.signal).toBe("SIGTERM");
    expect(world.executor.runCalls).toHaveLength(2);
    expect(world.executor.runCalls[1]?.promptText.startsWith("Fix the issues with the file\n")).toBe(
      true,
    );
    expect(await readStatuses(workspace)).toEqual({
      "src/a.ts": { status: "awaiting_verification", retries: 1 },
    });

    world.executor.onVerify = () => undefined;
    const recorder = recordTransitions();
    const resumed = await resumeTask({
      ...workspace,
      portsFactory: world.ports(),
      onTransition: recorder.onTransition,
    });

    expect(resumed?.done).toBe(true);
    expect(recorder.linesFor("src/a.ts")).toEqual([
      "awaiting_verification -> verify_in_progress (1)",
      "verify_in_progress -> completed (1)",
    ]);
    expect(world.executor.runCalls).toHaveLength(2);
  });

  it("reaches the same final status when stopped during verification and resumed", async () => {
    // Verification passes only once a fixup ran, and only one retry is allowed.
    const buildWorld = () => {
      const world = new FakeWorld();
      let fixed = false;
      world.executor.onRun = (call) => {
        if (call.promptText.startsWith("Fix the issues")) fixed = true;
      };
      world.executor.verifyDefault = () =>
        fixed ? { passed: true, output: "ok" } : { passed: false, output: "1 failing" };
      return world;
    };
    const settings = buildSettings({ verifyCommand: "npm test -- {file}", maxRetries: 1 });

    const straight = await setupWorkspace("run-engine-stop-straight-");
    await createAndRunTask({
      ...straight,
      settings,
      input: inputFor("src/a.ts"),
      portsFactory: buildWorld().ports(),
    });
    expect(await readStatuses(straight)).toEqual({
      "src/a.ts": { status: "completed", retries: 1 },
    });

    const interrupted = await setupWorkspace("run-engine-stop-interrupted-");
    const world = buildWorld();
    const controller = new AbortController();
    world.executor.onVerify = () => {
      controller.abort("SIGINT");
    };
    const stopped = await createAndRunTask({
      ...interrupted,
      settings,
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
      stopSignal: controller.signal,
    });
    expect(stopped.done).toBe(false);

    world.executor.onVerify = () => undefined;
    await resumeTask({ ...interrupted, portsFactory: world.ports() });

    expect(await readStatuses(interrupted)).toEqual(await readStatuses(straight));
  });

  it("claims nothing when the stop came before the run started", async () => {
    const workspace = await setupWorkspace("run-engine-stop-early-");
    const world = new FakeWorld();
    const controller = new AbortController();
    controller.abort({ signal: "SIGINT" });

    const created = await createTaskOnly({
      ...workspace,
      settings: buildSettings(),
      input: inputFor("src/a.ts"),
      portsFactory: world.ports(),
    });
    const result = await runWithStore({
      created,
      store: created.store,
      world,
      stopSignal: controller.signal,
    });

    expect(result.stopped).toEqual({ reason: "signal", signal: "SIGINT" });
    expect(world.executor.runCalls).toEqual([]);
  });
});
