import { describe, expect, it } from "vitest";
import { SimulatorSession } from "../session";

describe("pacman emulator", () => {
  it("refuses to mutate without root", () => {
    const sim = new SimulatorSession();
    expect(sim.apply("pacman -S firefox")).toEqual({
      status: "failure",
      output: "error: you cannot perform this operation unless you are root.",
      code: 1,
    });
    expect(sim.isInstalled("firefox")).toBe(false);
  });

  it("installs repo packages with sudo", () => {
    const sim = new SimulatorSession();
    const outcome = sim.apply("sudo pacman -S --noconfirm firefox");
    expect(outcome).toEqual({
      status: "success",
      output: [
        "resolving dependencies...",
        "looking for conflicting packages...",
        "Packages (1) firefox-131.0.3-1",
        "(1/1) installing firefox",
      ].join("\n"),
    });
    expect(sim.inspect().packages.get("firefox")).toEqual({ version: "131.0.3-1", origin: "repo" });
  });

  it("does not see AUR-only packages", () => {
    const sim = new SimulatorSession();
    expect(sim.apply("sudo pacman -S brave-bin")).toEqual({
      status: "failure",
      output: "error: target not found: brave-bin",
      code: 1,
    });
  });

  it("skips up-to-date packages with --needed", () => {
    const sim = new SimulatorSession();
    const outcome = sim.apply("sudo pacman -S --needed bash");
    expect(outcome.status).toBe("success");
    expect(outcome.output).toBe("warning: bash-5.2.037-1 is up to date -- skipping\n there is nothing to do");
  });

  it("fails downloads when the network is unreachable", () => {
    const sim = new SimulatorSession({ scenarios: ["network-down"] });
    const outcome = sim.apply("sudo pacman -S vim");
    expect(outcome.status).toBe("failure");
    expect(outcome.output.split("\n").at(-1)).toBe(
      "error: failed to commit transaction (failed to retrieve some files)"
    );
    expect(sim.isInstalled("vim")).toBe(false);
  });

  it("protects packages required by base", () => {
    const sim = new SimulatorSession();
    const outcome = sim.apply("sudo pacman -R systemd");
    expect(outcome).toEqual({
      status: "failure",
      output: [
        "error: failed to prepare transaction (could not satisfy dependencies)",
        ":: removing systemd breaks dependency 'systemd' required by base",
      ].join("\n"),
      code: 1,
    });
  });

  it("removes packages and stops their units", () => {
    const sim = new SimulatorSession();
    const outcome = sim.apply("sudo pacman -Rns bluez");
    expect(outcome.output).toBe(["checking dependencies...", "Packages (1) bluez-5.78-1", "(1/1) removing bluez"].join("\n"));
    expect(sim.inspect().services.get("bluetooth")?.status).toBe("stopped");
  });

  it("upgrades stale packages from the repositories", () => {
    const sim = new SimulatorSession({ scenarios: ["stale-packages"] });
    expect(sim.apply("sudo pacman -Syu").output).toBe(
      [
        ":: Synchronizing package databases...",
        " core is up to date",
        " extra is up to date",
        ":: Starting full system upgrade...",
        "Packages (3) linux-6.11.4.arch1-1  networkmanager-1.48.10-1  systemd-256.7-1",
        "(1/3) upgrading linux",
        "(2/3) upgrading networkmanager",
        "(3/3) upgrading systemd",
      ].join("\n")
    );
    expect(sim.apply("sudo pacman -Syu").output.split("\n").at(-1)).toBe(" there is nothing to do");
  });

  it("queries without root", () => {
    const sim = new SimulatorSession();
    expect(sim.apply("pacman -Q pacman")).toEqual({ status: "success", output: "pacman 7.0.0.r3.g7736133-1" });
    expect(sim.apply("pacman -Q vim")).toEqual({
      status: "failure",
      output: "error: package 'vim' was not found",
      code: 1,
    });
  });

  it("fails every call when libalpm is broken", () => {
    const sim = new SimulatorSession({ scenarios: ["pacman-broken"] });
    const outcome = sim.apply("pacman -Q");
    expect(outcome.status).toBe("failure");
    expect(outcome.output).toMatch(/^pacman: error while loading shared libraries: libalpm\.so/);
    expect(outcome.status === "failure" && outcome.code).toBe(127);
  });

  it("rejects unknown operations and options", () => {
    const sim = new SimulatorSession();
    expect(sim.apply("pacman -U foo.pkg.tar.zst").output).toBe("pacman: unknown subcommand '-U'");
    expect(sim.apply("sudo pacman -S --overwrite vim").output).toBe("pacman: unknown option '--overwrite'");
  });
});
