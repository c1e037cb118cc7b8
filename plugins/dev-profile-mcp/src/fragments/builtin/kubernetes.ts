import type { Fragment } from "../types.js";
import { registerWrappers } from "../wrapper.js";

export const kubernetesFragment: Fragment = {
  id: "kubernetes",
  description: "kubectl shortcuts, plus helm when it is installed.",
  prefix: "k8s",
  requires: ["kubectl"],
  optional: ["helm"],
  register(ctx, scope) {
    registerWrappers(ctx, scope, "kubectl", [
      { name: "k8s_get", description: "Get resources (kind and name in args).", baseArgs: ["get"], duration: "normal", readOnly: true },
      { name: "k8s_describe", description: "Describe a resource.", baseArgs: ["describe"], duration: "normal", readOnly: true },
      { name: "k8s_logs", description: "Pod logs (pod name in args).", baseArgs: ["logs", "--tail", "200"], duration: "normal", readOnly: true },
      { name: "k8s_contexts", description: "List kubeconfig contexts.", baseArgs: ["config", "get-contexts"], duration: "instant", readOnly: true },
      { name: "k8s_use_context", description: "Switch kubeconfig context.", baseArgs: ["config", "use-context"], duration: "instant" },
      { name: "k8s_apply", description: "Apply manifests (-f path in args).", baseArgs: ["apply"], duration: "slow" },
    ]);
    if (scope.mode === "always" || ctx.availability.isAvailable("helm")) {
      registerWrappers(ctx, scope, "helm", [
        { name: "k8s_helm_list", description: "Helm releases in all namespaces.", baseArgs: ["list", "-A"], duration: "normal", readOnly: true },
        { name: "k8s_helm_status", description: "Status of a helm release.", baseArgs: ["status"], duration: "normal", readOnly: true },
      ]);
    }
  },
};
