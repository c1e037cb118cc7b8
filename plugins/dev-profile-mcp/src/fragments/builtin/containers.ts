import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

/** docker and podman share a CLI surface; whichever is installed runs. */
const RUNTIMES = ["docker", "podman"] as const;

export const containersFragment: Fragment = {
  id: "containers",
  description: "Container engine shortcuts for docker or podman.",
  prefix: "ctr",
  requires: [],
  anyOf: RUNTIMES,
  register(ctx, scope) {
    registerWrappers(ctx, scope, RUNTIMES, [
      { name: "ctr_ps", description: "List containers, including stopped ones.", baseArgs: ["ps", "-a"], duration: "quick", readOnly: true },
      { name: "ctr_images", description: "List local images.", baseArgs: ["images"], duration: "quick", readOnly: true },
      { name: "ctr_logs", description: "Tail container logs (container name in args).", baseArgs: ["logs", "--tail", "200"], duration: "quick", readOnly: true },
      { name: "ctr_inspect", description: "Inspect a container or image.", baseArgs: ["inspect"], duration: "quick", readOnly: true },
      { name: "ctr_start", description: "Start containers.", baseArgs: ["start"], duration: "quick" },
      { name: "ctr_stop", description: "Stop containers.", baseArgs: ["stop"], duration: "normal", destructive: true },
      { name: "ctr_prune", description: "Remove stopped containers, dangling images and unused networks.", baseArgs: ["system", "prune", "-f"], duration: "slow", destructive: true },
      { name: "ctr_compose_up", description: "Start a compose project detached.", baseArgs: ["compose", "up", "-d"], duration: "slow" },
      { name: "ctr_compose_down", description: "Stop and remove a compose project.", baseArgs: ["compose", "down"], duration: "normal", destructive: true },
      { name: "ctr_compose_ps", description: "Compose project status.", baseArgs: ["compose", "ps"], duration: "quick", readOnly: true },
    ]);
  },
};
