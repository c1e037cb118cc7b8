import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

export const nodeFragment: Fragment = {
  id: "node",
  description: "npm project shortcuts.",
  prefix: "npm",
  requires: ["npm"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "npm", [
      { name: "npm_install", description: "Install project dependencies.", baseArgs: ["install"], duration: "long_running" },
      { name: "npm_ci", description: "Clean install from the lockfile.", baseArgs: ["ci"], duration: "long_running" },
      { name: "npm_run", description: "Run a package script (script name in args).", baseArgs: ["run"], duration: "long_running" },
      { name: "npm_test", description: "Run the test script.", baseArgs: ["test"], duration: "long_running" },
      { name: "npm_outdated", description: "List outdated dependencies.", baseArgs: ["outdated"], duration: "slow", readOnly: true },
      { name: "npm_audit", description: "Security audit of installed dependencies.", baseArgs: ["audit"], duration: "slow", readOnly: true },
      { name: "npm_list", description: "Top-level installed packages.", baseArgs: ["ls", "--depth=0"], duration: "normal", readOnly: true },
    ]);
  },
};
