import { describe, expect, it } from "vitest";
import { AuditQueryService } from "../../../packages/audit/src";
import { InMemoryEventStore } from "../../../packages/event-store/src";
import { StubTranslator } from "../../../packages/resolver/src";
import { listScenarios } from "../../../packages/simulator/src";
import { AUDIT_TAIL, HELP, ReplSession } from "./session";

describe("ReplSession", () => {
  it("handles the built-in words", async () => {
    const repl = new ReplSession();
    expect(await repl.handle("   ")).toEqual({ lines: [] });
    expect(await repl.handle("help")).toEqual({ lines: HELP });
    expect(await repl.handle("history")).toEqual({ lines: ["no commands yet"] });
    expect(await repl.handle("quit")).toEqual({ lines: [], done: true });
    expect(await repl.handle("exit")).toEqual({ lines: [], done: true });
  });

  it("lists and loads scenarios", async () => {
    const repl = new ReplSession();
    const listed = await repl.handle("scenario");
    expect(listed.lines).toHaveLength(listScenarios().length);
    expect(listed.lines[0]).toBe("network-down    links down, NetworkManager failed");

    expect((await repl.handle("scenario nope")).lines[0]).toMatch(/^unknown scenario "nope"/);
    expect(await repl.handle("scenario audio-broken")).toEqual({ lines: ["scenario loaded: audio-broken"] });
    expect(repl.session.inspect().services.get("pipewire")?.status).toBe("failed");
  });

  it("repairs a broken scenario through an ai request", async () => {
    const repl = new ReplSession();
    await repl.handle("scenario audio-broken");
    expect(await repl.handle("ai fix sound")).toEqual({
      lines: ["$ systemctl --user restart pipewire wireplumber"],
      code: 0,
    });
    expect(await repl.handle("systemctl --user is-active pipewire")).toEqual({
      lines: ["$ systemctl --user is-active pipewire", "active"],
      code: 0,
    });
  });

  it("passes plain commands to the emulators unmodified", async () => {
    const repl = new ReplSession();
    expect(await repl.handle("pacman -S vlc")).toEqual({
      lines: ["$ pacman -S vlc", "error: you cannot perform this operation unless you are root."],
      code: 1,
    });
    expect(repl.session.isInstalled("vlc")).toBe(false);
  });

  it("never runs what the gate rejects", async () => {
    const repl = new ReplSession();
    expect(await repl.handle("rm -rf /")).toEqual({
      lines: ["rejected: recursive removal is forbidden", "  command: rm -rf /"],
      code: 1,
    });
    expect(await repl.handle("ai upgrade system; reboot")).toEqual({
      lines: ["could not understand \"upgrade system; reboot\""],
      code: 0,
    });
    expect(repl.session.history()).toEqual([]);
  });

  it("numbers the history", async () => {
    const repl = new ReplSession();
    await repl.handle("ip link");
    await repl.handle("pacman -S vlc");
    expect(await repl.handle("history")).toEqual({
      lines: ["  1  ip link  (ok)", "  2  pacman -S vlc  (exit 1)"],
    });
  });

  it("shows the audit trail of the session", async () => {
    const eventStore = new InMemoryEventStore();
    const repl = new ReplSession({ eventStore });
    expect(await repl.handle("audit")).toEqual({ lines: ["no audit records"] });

    await repl.handle("ip link");
    await repl.handle("rm -rf /");
    const [first, , last] = await new AuditQueryService(eventStore).list();
    const ran = first.meta.planId ?? "";
    const refused = last.meta.planId ?? "";

    expect(await repl.handle(`audit ${ran}`)).toEqual({
      lines: [`${ran}  plan.validate approved  unknown`, `${ran}  step.succeeded succeeded  ip link`],
    });
    expect((await repl.handle("audit")).lines).toEqual([
      `${ran}  plan.validate approved  unknown`,
      `${ran}  step.succeeded succeeded  ip link`,
      `${refused}  plan.validate rejected  rm -rf /`,
    ]);
    expect(await repl.handle("audit missing-plan")).toEqual({ lines: ["no audit records for missing-plan"] });
  });

  it("keeps a bare audit to the most recent records", async () => {
    const repl = new ReplSession();
    for (let i = 0; i < 11; i += 1) await repl.handle("ip link");
    const lines = (await repl.handle("audit")).lines;
    expect(lines).toHaveLength(AUDIT_TAIL);
    expect(lines[AUDIT_TAIL - 1]).toMatch(/  step\.succeeded succeeded  ip link$/);
  });

  it("asks the translator only for ai lines the rules miss", async () => {
    const translator = new StubTranslator({ "play some music": "install spotify" });
    const eventStore = new InMemoryEventStore();
    const repl = new ReplSession({ translator, eventStore });
    const reply = await repl.handle("ai play some music");
    expect(reply.code).toBe(0);
    expect(reply.lines[0]).toBe("$ paru -S --noconfirm spotify");
    expect(repl.session.isInstalled("spotify")).toBe(true);
    expect(translator.requests.map((request) => request.user)).toEqual(["play some music"]);

    const actions = (await new AuditQueryService(eventStore).list()).map((record) => record.payload.action);
    expect(actions).toEqual(["plan.validate", "step.succeeded"]);
  });
});
