import type { Fragment } from "../types.js";
import { gitFragment, githubFragment } from "./git.js";
import { containersFragment } from "./containers.js";
import { kubernetesFragment } from "./kubernetes.js";
import { nodeFragment } from "./node.js";
import { pythonFragment } from "./python.js";
import { homebrewFragment, scoopFragment, wingetFragment } from "./package-managers.js";
import { awsFragment, azureFragment, gcpFragment } from "./cloud.js";

/** Fragments shipped with the server, in load order (dependencies may appear later; the loader reorders). */
export const BUILTIN_FRAGMENTS: readonly Fragment[] = [
  gitFragment,
  githubFragment,
  containersFragment,
  kubernetesFragment,
  nodeFragment,
  pythonFragment,
  homebrewFragment,
  scoopFragment,
  wingetFragment,
  awsFragment,
  azureFragment,
  gcpFragment,
];
