import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

export const awsFragment: Fragment = {
  id: "cloud-aws",
  description: "AWS CLI shortcuts.",
  prefix: "aws",
  requires: ["aws"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "aws", [
      { name: "aws_whoami", description: "Caller identity for the active profile.", baseArgs: ["sts", "get-caller-identity"], duration: "normal", readOnly: true },
      { name: "aws_profiles", description: "Configured profiles.", baseArgs: ["configure", "list-profiles"], duration: "quick", readOnly: true },
      { name: "aws_s3_ls", description: "List buckets or a bucket prefix.", baseArgs: ["s3", "ls"], duration: "normal", readOnly: true },
      { name: "aws_sso_login", description: "Start an SSO login (--profile in args).", baseArgs: ["sso", "login"], duration: "long_running" },
    ]);
  },
};

export const azureFragment: Fragment = {
  id: "cloud-azure",
  description: "Azure CLI shortcuts.",
  prefix: "az",
  requires: ["az"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "az", [
      { name: "az_account_show", description: "Active subscription.", baseArgs: ["account", "show"], duration: "normal", readOnly: true },
      { name: "az_account_list", description: "Subscriptions for the signed-in account.", baseArgs: ["account", "list", "--output", "table"], duration: "normal", readOnly: true },
      { name: "az_group_list", description: "Resource groups.", baseArgs: ["group", "list", "--output", "table"], duration: "normal", readOnly: true },
      { name: "az_login", description: "Sign in.", baseArgs: ["login"], duration: "long_running" },
    ]);
  },
};

export const gcpFragment: Fragment = {
  id: "cloud-gcp",
  description: "Google Cloud CLI shortcuts.",
  prefix: "gcloud",
  requires: ["gcloud"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "gcloud", [
      { name: "gcloud_config_list", description: "Active configuration.", baseArgs: ["config", "list"], duration: "quick", readOnly: true },
      { name: "gcloud_projects", description: "Accessible projects.", baseArgs: ["projects", "list"], duration: "normal", readOnly: true },
      { name: "gcloud_auth_list", description: "Credentialed accounts.", baseArgs: ["auth", "list"], duration: "quick", readOnly: true },
      { name: "gcloud_set_project", description: "Set the default project (id in args).", baseArgs: ["config", "set", "project"], duration: "quick" },
    ]);
  },
};
