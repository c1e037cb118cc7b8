import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

export const gitFragment: Fragment = {
  id: "git",
  description: "Git repository shortcuts.",
  prefix: "git",
  requires: ["git"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "git", [
      { name: "git_status", description: "Short working tree status with branch info.", baseArgs: ["status", "--short", "--branch"], duration: "quick", readOnly: true },
      { name: "git_log", description: "One-line history with graph and decorations.", baseArgs: ["log", "--oneline", "--graph", "--decorate", "-n", "30"], duration: "quick", readOnly: true },
      { name: "git_diff", description: "Diff of the working tree; pass --staged in args for the index.", baseArgs: ["diff"], duration: "quick", readOnly: true },
      { name: "git_branches", description: "Local and remote branches with their last commit.", baseArgs: ["branch", "-a", "-vv"], duration: "quick", readOnly: true },
      { name: "git_fetch", description: "Fetch all remotes and prune deleted branches.", baseArgs: ["fetch", "--all", "--prune"], duration: "slow" },
      { name: "git_pull", description: "Pull with rebase.", baseArgs: ["pull", "--rebase"], duration: "slow" },
      { name: "git_stash", description: "Stash local changes (pass 'pop' or 'list' in args to change the action).", baseArgs: ["stash"], duration: "quick" },
    ]);
  },
};

export const githubFragment: Fragment = {
  id: "github",
  description: "GitHub CLI shortcuts layered on the git fragment.",
  prefix: "gh",
  requires: ["gh"],
  dependsOn: ["git"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "gh", [
      { name: "gh_pr_list", description: "Open pull requests for the current repository.", baseArgs: ["pr", "list"], duration: "normal", readOnly: true },
      { name: "gh_pr_view", description: "Show a pull request (number in args).", baseArgs: ["pr", "view"], duration: "normal", readOnly: true },
      { name: "gh_pr_checks", description: "CI checks for a pull request.", baseArgs: ["pr", "checks"], duration: "normal", readOnly: true },
      { name: "gh_issue_list", description: "Open issues for the current repository.", baseArgs: ["issue", "list"], duration: "normal", readOnly: true },
      { name: "gh_run_list", description: "Recent workflow runs.", baseArgs: ["run", "list"], duration: "normal", readOnly: true },
    ]);
  },
};
