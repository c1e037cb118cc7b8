/** Whether fragments with missing commands still register their tools. */
export type RegistrationMode = "conditional" | "always";

/** Full profile configuration. */
export interface ProfileConfig {
  availability: {
    ttl_seconds: number;
    extra_paths: string[];
    overrides: Record<string, boolean>;
  };
  registration: {
    mode: RegistrationMode;
  };
  fragments: {
    disabled: string[];
  };
  install_hints: {
    additional_files: string[];
  };
  execution: {
    timeout_ceiling_seconds: number;
    max_output_kb: number;
  };
}
