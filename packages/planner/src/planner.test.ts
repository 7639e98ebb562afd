import pino from "pino";
import { beforeEach, describe, expect, it } from "vitest";
import { AuditLogger, AuditQueryService } from "../../audit/src";
import { InMemoryEventStore } from "../../event-store/src";
import { StubTranslator } from "../../resolver/src";
import { Configuration, DEFAULT_CONFIGURATION } from "../../shared/src";
import { Planner } from "./planner";

const config = (overrides: Partial<Configuration> = {}): Configuration => ({ ...DEFAULT_CONFIGURATION, ...overrides });

describe("Planner", () => {
  let store: InMemoryEventStore;
  let planner: Planner;

  beforeEach(() => {
    store = new InMemoryEventStore();
    planner = new Planner({ eventStore: store, audit: new AuditLogger(store) });
  });

  it("approves install firefox with the default configuration", async () => {
    const res = await planner.plan({ text: "install firefox", config: config(), planId: "plan-1" });
    expect(res.status).toBe("approved");
    if (res.status !== "approved") return;
    expect(res.plan.commands).toEqual(["sudo pacman -S firefox"]);
    expect(res.plan.steps[0].risk).toBe("requires-confirmation");
    expect(res.explain).toEqual(["install firefox"]);
  });

  it("emits the pipeline events in order", async () => {
    await planner.plan({ text: "install firefox", config: config(), planId: "plan-2" });
    const events = await store.query({ planId: "plan-2" });
    expect(events.map((e) => e.type)).toEqual([
      "plan.requested",
      "plan.resolved",
      "plan.synthesized",
      "plan.approved",
      "audit.record",
    ]);
  });

  it("records suggest-mode plans as suggested", async () => {
    await planner.plan({ text: "clean cache", config: config(), planId: "plan-3" });
    const [record] = await new AuditQueryService(store).list({ planId: "plan-3" });
    expect(record.payload.status).toBe("suggested");
    expect(record.payload.data).toEqual({ commands: ["sudo pacman -Sc"] });
  });

  it("uses paru when preferred, available and sudo is off", async () => {
    const res = await planner.plan({
      text: "install firefox",
      config: config({ noSudo: true, preferParu: true, paruAvailable: true }),
    });
    expect(res.status === "approved" && res.plan.commands).toEqual(["paru -S firefox"]);
  });

  it("rejects an offline upgrade", async () => {
    const res = await planner.plan({ text: "upgrade system", config: config({ offline: true }) });
    expect(res).toMatchObject({ status: "rejected", reason: "network required", command: "pacman -Syu" });
  });

  it("rejects destructive text before resolving anything", async () => {
    const res = await planner.plan({ text: "please rm -rf / thanks", config: config(), planId: "plan-4" });
    expect(res).toMatchObject({ status: "rejected", reason: "recursive removal is forbidden" });
    const events = await store.query({ planId: "plan-4" });
    expect(events.map((e) => e.type)).toEqual(["plan.requested", "plan.rejected", "audit.record"]);
  });

  it("rejects destructive text wrapped in quotes or brackets", async () => {
    for (const text of ['please run "rm -rf /"', "do 'rm -rf /'", "x;rm -rf /", "(rm -rf /)"]) {
      const res = await planner.plan({ text, config: config() });
      expect(res).toMatchObject({ status: "rejected", reason: "recursive removal is forbidden", command: text });
    }
  });

  it("explains targets the machine already satisfies", async () => {
    const context = { isInstalled: (name: string) => name === "bash" };
    const res = await planner.plan({ text: "install bash", config: config(), context });
    if (res.status !== "approved") throw new Error(res.reason);
    expect(res.plan.commands).toEqual([]);
    expect(res.explain).toEqual(["bash is already installed"]);

    const mixed = await planner.plan({ text: "install bash vlc", config: config(), context });
    expect(mixed.explain).toEqual(["bash is already installed", "install vlc"]);
  });

  it("plans removals and status questions from everyday phrasing", async () => {
    const removal = await planner.plan({ text: "get rid of firefox", config: config() });
    expect(removal.status === "approved" && removal.plan.commands).toEqual(["sudo pacman -R firefox"]);
    const status = await planner.plan({ text: "wifi status", config: config() });
    expect(status.status === "approved" && status.plan.steps).toEqual([
      { command: "nmcli general status", risk: "safe", reason: "show network status" },
    ]);
  });

  it("keeps log plans safe", async () => {
    const res = await planner.plan({ text: "logs sshd", config: config() });
    if (res.status !== "approved") throw new Error(res.reason);
    expect(res.plan.steps).toEqual([
      { command: "journalctl -u sshd --no-pager -n 50", risk: "safe", reason: "show logs for sshd" },
    ]);
  });

  it("explains empty plans", async () => {
    const unknown = await planner.plan({ text: "sing me a song", config: config() });
    expect(unknown).toMatchObject({ status: "approved", explain: ['could not understand "sing me a song"'] });

    const install = await planner.plan({ text: "install", config: config() });
    expect(install).toMatchObject({ status: "approved", explain: ["install needs a target"] });

    const testAi = await planner.plan({ text: "test ai", config: config() });
    expect(testAi.explain).toEqual(["no translator configured (set OPENAI_API_KEY)"]);
  });

  it("falls back to the translator", async () => {
    const translator = new StubTranslator({ "my browser vanished": "install firefox" });
    planner = new Planner({ eventStore: store, audit: new AuditLogger(store), translator });
    const res = await planner.plan({ text: "my browser vanished", config: config(), planId: "plan-5" });
    expect(res.intent).toEqual({ kind: "install", target: "firefox", source: "translator" });
    const [resolved] = await store.query({ planId: "plan-5", types: ["plan.resolved"] });
    expect(resolved.meta.source).toBe("translator");

    const testAi = await planner.plan({ text: "test ai", config: config() });
    expect(testAi.explain).toEqual(['translator "stub" is configured']);
  });

  it("passes literal commands through the gate", async () => {
    const read = await planner.planCommand({ command: "ip link", config: config() });
    expect(read.status === "approved" && read.plan.steps[0].risk).toBe("safe");

    const restart = await planner.planCommand({ command: "sudo systemctl restart bluetooth", config: config() });
    expect(restart.status === "approved" && restart.plan.steps[0].risk).toBe("requires-confirmation");

    const piped = await planner.planCommand({ command: "pacman -Q | grep vim", config: config() });
    expect(piped).toMatchObject({ status: "rejected", reason: "shell metacharacters are not allowed" });
  });

  it("logs rejections and unresolved text", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (line: string) => void lines.push(line) });
    const logged = new Planner({ eventStore: store, audit: new AuditLogger(store), logger });

    await logged.plan({ text: "make me a sandwich", config: config() });
    await logged.plan({ text: "upgrade system", config: config({ offline: true }) });

    const records = lines.map((line) => JSON.parse(line));
    expect(records.map((r) => r.msg)).toEqual(["intent unresolved", "plan rejected"]);
    expect(records[0].error).toEqual({ code: "unresolved_intent", message: 'could not resolve an action from "make me a sandwich"' });
    expect(records[1].error).toEqual({
      code: "validation_rejected",
      message: "rejected: network required (pacman -Syu)",
      details: { reason: "network required", command: "pacman -Syu" },
    });
  });
});
