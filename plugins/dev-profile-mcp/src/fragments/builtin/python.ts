import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

/** Windows installs usually expose `python`; POSIX hosts `python3`. */
const INTERPRETERS = ["python3", "python"] as const;

export const pythonFragment: Fragment = {
  id: "python",
  description: "Python interpreter and pip shortcuts (pip runs as `python -m pip`).",
  prefix: "py",
  requires: [],
  anyOf: INTERPRETERS,
  register(ctx, scope) {
    registerWrappers(ctx, scope, INTERPRETERS, [
      { name: "py_version", description: "Interpreter version.", baseArgs: ["--version"], duration: "instant", readOnly: true },
      { name: "py_run", description: "Run a script or module (-m name) with arguments.", baseArgs: [], duration: "long_running" },
      { name: "py_venv", description: "Create a virtual environment (target dir in args, default .venv).", baseArgs: ["-m", "venv"], duration: "slow" },
      { name: "py_pip_list", description: "Installed packages.", baseArgs: ["-m", "pip", "list"], duration: "normal", readOnly: true },
      { name: "py_pip_install", description: "Install packages.", baseArgs: ["-m", "pip", "install"], duration: "long_running" },
      { name: "py_pip_outdated", description: "Outdated packages.", baseArgs: ["-m", "pip", "list", "--outdated"], duration: "slow", readOnly: true },
    ]);
  },
};
