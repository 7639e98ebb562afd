import { describe, expect, it } from "vitest";
import { CommandPlan, Intent, PlanStep } from "../../shared/src";
import { SafetyGate } from "./index";

const intent: Intent = { kind: "install", target: "firefox", source: "rules" };

const planOf = (...steps: PlanStep[]): CommandPlan => ({ intent, steps });

const step = (command: string, risk: PlanStep["risk"] = "requires-confirmation"): PlanStep => ({
  command,
  risk,
  reason: "test step",
});

describe("SafetyGate", () => {
  const gate = new SafetyGate();

  it("approves allowlisted commands unchanged", () => {
    const result = gate.validate(planOf(step("sudo pacman -S firefox")));
    expect(result.status).toBe("approved");
    if (result.status !== "approved") return;
    expect(result.plan.commands).toEqual(["sudo pacman -S firefox"]);
    expect(result.plan.steps[0].risk).toBe("requires-confirmation");
    expect(result.plan.intent).toEqual(intent);
  });

  it("rejects steps tagged forbidden with their own reason", () => {
    expect(gate.validate(planOf({ command: "pacman -Syu", risk: "forbidden", reason: "network required" }))).toEqual({
      status: "rejected",
      reason: "network required",
      command: "pacman -Syu",
    });
  });

  it("rejects shell metacharacters before anything else", () => {
    expect(gate.validate(planOf(step("sudo pacman -S firefox; rm -rf /")))).toEqual({
      status: "rejected",
      reason: "shell metacharacters are not allowed",
      command: "sudo pacman -S firefox; rm -rf /",
    });
    expect(gate.validate(planOf(step("launch $(whoami)"))).status).toBe("rejected");
  });

  it("rejects forbidden patterns", () => {
    expect(gate.validate(planOf(step("rm -rf /")))).toEqual({
      status: "rejected",
      reason: "recursive removal is forbidden",
      command: "rm -rf /",
    });
    expect(gate.validate(planOf(step("wget example.invalid/x")))).toMatchObject({
      reason: "downloading outside the package manager is forbidden",
    });
    expect(gate.validate(planOf(step("sudo dd if=/dev/zero of=/dev/sda")))).toMatchObject({
      reason: "raw disk writes are forbidden",
    });
  });

  it("enforces the argument grammar", () => {
    expect(gate.validate(planOf(step("sudo launch vlc")))).toMatchObject({ reason: "sudo is not allowed before launch" });
    expect(gate.validate(planOf(step("pacman -U vim.pkg.tar.zst")))).toMatchObject({
      reason: "pacman operation not allowed: -U",
    });
    expect(gate.validate(planOf(step("sudo pacman -S --overwrite vim")))).toMatchObject({
      reason: "pacman option not allowed: --overwrite",
    });
    expect(gate.validate(planOf(step("systemctl restart")))).toMatchObject({ reason: "systemctl needs a unit" });
    expect(gate.validate(planOf(step("nmcli radio wifi off")))).toMatchObject({
      reason: "nmcli arguments not allowed: radio wifi off",
    });
    expect(gate.validate(planOf(step("python -c pass")))).toMatchObject({ reason: "command not in allowlist: python" });
  });

  it("rejects the whole plan on the first bad step", () => {
    const result = gate.validate(planOf(step("sudo pacman -S vlc"), step("vlc --fullscreen", "safe")));
    expect(result).toEqual({ status: "rejected", reason: "command not in allowlist: vlc", command: "vlc --fullscreen" });
  });

  it("requires the network for sync operations when offline", () => {
    const offline = new SafetyGate({ offline: true });
    expect(offline.validate(planOf(step("sudo pacman -S vim")))).toEqual({
      status: "rejected",
      reason: "network required",
      command: "sudo pacman -S vim",
    });
    expect(offline.validate(planOf(step("paru")))).toMatchObject({ reason: "network required" });
    expect(offline.validate(planOf(step("sudo pacman -Sc"))).status).toBe("approved");
    expect(offline.validate(planOf(step("sudo pacman -R vim"))).status).toBe("approved");
  });

  it("raises safe steps that change the system", () => {
    const result = gate.validate(
      planOf(step("sudo systemctl restart bluetooth", "safe"), step("journalctl -u sshd --no-pager -n 50", "safe"))
    );
    if (result.status !== "approved") throw new Error(result.reason);
    expect(result.plan.steps.map((s) => s.risk)).toEqual(["requires-confirmation", "safe"]);
  });

  it("gives the same answer every time", () => {
    const plan = planOf(step("sudo pacman -S firefox"), step("launch firefox", "safe"));
    expect(gate.validate(plan)).toEqual(gate.validate(plan));
  });

  it("approves an empty plan", () => {
    const result = gate.validate(planOf());
    expect(result.status).toBe("approved");
  });

  describe("screen", () => {
    it("rejects destructive text anywhere in the input", () => {
      expect(gate.screen("please rm -rf / and then install firefox")).toEqual({
        status: "rejected",
        reason: "recursive removal is forbidden",
        command: "please rm -rf / and then install firefox",
      });
      expect(gate.screen("Wipe /dev/SDA now")).toMatchObject({ reason: "block devices are off limits" });
    });

    it("finds commands behind quotes, brackets and separators", () => {
      for (const text of ['please run "rm -rf /"', "do 'rm -rf /'", "x;rm -rf /", "(rm -rf /)", "/usr/bin/rm -r /home"]) {
        expect(gate.screen(text)).toEqual({ status: "rejected", reason: "recursive removal is forbidden", command: text });
      }
      expect(gate.screen('try "dd if=/dev/zero of=disk.img"')).toMatchObject({ reason: "raw disk writes are forbidden" });
      expect(gate.screen("(mkfs.ext4 disk.img)")).toMatchObject({ reason: "creating filesystems is forbidden" });
      expect(gate.screen("'chmod 777 /etc'")).toMatchObject({
        reason: "changing ownership or modes of system paths is forbidden",
      });
    });

    it("lets ordinary requests through", () => {
      expect(gate.screen("install bash")).toBeUndefined();
      expect(gate.screen("add vim")).toBeUndefined();
      expect(gate.screen("install python-dd")).toBeUndefined();
      expect(gate.screen("add ddrescue")).toBeUndefined();
    });
  });
});
