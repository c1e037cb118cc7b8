import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

export const homebrewFragment: Fragment = {
  id: "homebrew",
  description: "Homebrew shortcuts (macOS and Linux).",
  prefix: "brew",
  requires: ["brew"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "brew", [
      { name: "brew_install", description: "Install formulae or casks.", baseArgs: ["install"], duration: "long_running" },
      { name: "brew_upgrade", description: "Upgrade installed packages.", baseArgs: ["upgrade"], duration: "long_running" },
      { name: "brew_update", description: "Fetch the newest Homebrew and formulae.", baseArgs: ["update"], duration: "slow" },
      { name: "brew_search", description: "Search formulae and casks.", baseArgs: ["search"], duration: "normal", readOnly: true },
      { name: "brew_list", description: "Installed formulae and casks.", baseArgs: ["list"], duration: "quick", readOnly: true },
      { name: "brew_outdated", description: "Outdated packages.", baseArgs: ["outdated"], duration: "normal", readOnly: true },
      { name: "brew_cleanup", description: "Remove old versions and cache files.", baseArgs: ["cleanup"], duration: "slow", destructive: true },
    ]);
  },
};

export const scoopFragment: Fragment = {
  id: "scoop",
  description: "Scoop shortcuts (Windows).",
  prefix: "scoop",
  requires: ["scoop"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "scoop", [
      { name: "scoop_install", description: "Install apps.", baseArgs: ["install"], duration: "long_running" },
      { name: "scoop_update", description: "Update apps (pass * in args for all).", baseArgs: ["update"], duration: "long_running" },
      { name: "scoop_search", description: "Search buckets.", baseArgs: ["search"], duration: "normal", readOnly: true },
      { name: "scoop_list", description: "Installed apps.", baseArgs: ["list"], duration: "quick", readOnly: true },
      { name: "scoop_status", description: "Apps with available updates.", baseArgs: ["status"], duration: "normal", readOnly: true },
      { name: "scoop_cleanup", description: "Remove old app versions (pass * in args for all).", baseArgs: ["cleanup"], duration: "slow", destructive: true },
    ]);
  },
};

export const wingetFragment: Fragment = {
  id: "winget",
  description: "winget shortcuts (Windows).",
  prefix: "winget",
  requires: ["winget"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "winget", [
      { name: "winget_install", description: "Install a package by id.", baseArgs: ["install", "--accept-package-agreements", "--accept-source-agreements"], duration: "long_running" },
      { name: "winget_upgrade", description: "Upgrade packages (pass --all in args for all).", baseArgs: ["upgrade"], duration: "long_running" },
      { name: "winget_search", description: "Search the package sources.", baseArgs: ["search"], duration: "normal", readOnly: true },
      { name: "winget_list", description: "Installed packages.", baseArgs: ["list"], duration: "normal", readOnly: true },
    ]);
  },
};
