import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { applyCommand, classify, parseInvocation } from "./dispatch";
import { createSystemState } from "./state";

describe("dispatch", () => {
  it("classifies known programs into subsystems", () => {
    expect(classify("pacman")).toEqual({ kind: "package-manager" });
    expect(classify("paru")).toEqual({ kind: "aur-helper" });
    expect(classify("journalctl")).toEqual({ kind: "service-manager", tool: "journalctl" });
    expect(classify("nmcli")).toEqual({ kind: "network", tool: "nmcli" });
    expect(classify("launch")).toEqual({ kind: "launcher" });
    expect(classify("rm")).toBeUndefined();
  });

  it("strips a leading sudo into the elevated flag", () => {
    expect(parseInvocation("  sudo   pacman -S vim ")).toEqual({ program: "pacman", args: ["-S", "vim"], elevated: true });
    expect(parseInvocation("sudo")).toBeUndefined();
  });

  it("treats unknown programs as not found", () => {
    const state = createSystemState();
    expect(applyCommand("htop", state)).toEqual({ status: "failure", output: "htop: command not found", code: 127 });
  });

  it("launches only installed apps", () => {
    const state = createSystemState();
    expect(applyCommand("launch vlc", state)).toEqual({ status: "failure", output: "vlc: command not found", code: 127 });
    applyCommand("sudo pacman -S vlc", state);
    expect(applyCommand("launch vlc", state)).toEqual({ status: "success", output: "launching vlc" });
  });

  it("records every command in order", () => {
    fc.assert(
      fc.property(fc.array(fc.string(), { maxLength: 8 }), (commands) => {
        const state = createSystemState();
        commands.forEach((command) => applyCommand(command, state));
        expect(state.history.map((entry) => entry.command)).toEqual(commands);
        expect(state.history.map((entry) => entry.seq)).toEqual(commands.map((_, i) => i + 1));
      })
    );
  });
});
