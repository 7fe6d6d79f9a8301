import { describe, it, expect } from "vitest";
import { silentLogger } from "../src/logging/logger.js";
import { PlatformWorkflows } from "../src/workflows/workflows.js";
import { FakeBrowser, FakePlatform, fakeClock } from "./helpers/fakePlatform.js";

function setup() {
  const platform = new FakePlatform();
  const browser = new FakeBrowser();
  const clock = fakeClock();
  const workflows = new PlatformWorkflows({
    client: platform,
    browser,
    logger: silentLogger(),
    pollIntervalMs: 1_000,
    sleep: clock.sleep,
    now: clock.now
  });
  return { platform, browser, workflows };
}

describe("PlatformWorkflows", () => {
  it("stops an analysis with or without saving outputs", async () => {
    const { platform, workflows } = setup();
    await workflows.stopAnalysis("an-1", true);
    await workflows.stopAnalysis("an-2", false);

    expect(platform.callsTo("controlAnalysis").map((c) => c.args)).toEqual([
      ["an-1", "save_and_exit", true],
      ["an-2", "exit", false]
    ]);
  });

  it("extends the time limit without a save flag", async () => {
    const { platform, workflows } = setup();
    await workflows.extendAnalysisTime("an-1");
    expect(platform.callsTo("controlAnalysis")[0]?.args).toEqual(["an-1", "extend_time", undefined]);
  });

  it("opens URLs through the browser opener", async () => {
    const { browser, workflows } = setup();
    await workflows.openInBrowser("https://a1.apps.test");
    expect(browser.opened).toEqual(["https://a1.apps.test"]);
  });

  it("runs launch-and-wait with the configured poll interval", async () => {
    const { platform, workflows } = setup();
    platform.parameters = { overall_job_type: "VICE", groups: [] };
    platform.statuses = [
      { analysis_id: "an-1", status: "Running", url_ready: true, url: "https://a1.apps.test" }
    ];

    const outcome = await workflows.launchAndWait({ appId: "app-1", systemId: "de", config: {}, maxWaitMs: 10_000 });
    expect(outcome).toEqual({
      state: "ready",
      analysisId: "an-1",
      name: "job-1",
      status: "Running",
      url: "https://a1.apps.test"
    });
  });

  it("propagates client failures", async () => {
    const { platform, workflows } = setup();
    platform.failure = new Error("platform down");
    await expect(workflows.stopAnalysis("an-1", true)).rejects.toThrow("platform down");
  });
});
