import * as fs from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ok, err, type Result } from "neverthrow";
import { LocalBackend } from "../backends/local.js";
import { readDeclarations, type DeclarationError } from "../core/declarations.js";
import type { EngineEvent, EngineInput } from "../core/engine.js";
import { formatEngineError, type EngineError } from "../core/errors.js";
import { ProviderRegistrySchema, type ProviderRegistry } from "../core/provider.js";
import { parseSchemas, type SchemaError } from "../core/schema.js";
import type { ResourceDeclaration, ResourceSchemas } from "../core/types.js";
import {
  DEFAULT_CONFIG_PATH,
  readConfig,
  retryPolicy,
  type ConfigError,
  type StratumConfig,
} from "./config.js";

export type ProjectOptions = {
  readonly configPath?: string;
  readonly cwd?: string;
};

export type Project = {
  readonly config: StratumConfig;
  /** Directory paths in the config are relative to. */
  readonly root: string;
  readonly declarations: readonly ResourceDeclaration[];
  readonly schemas: ResourceSchemas;
  readonly backend: LocalBackend;
};

export type CliError =
  | { readonly kind: "config"; readonly error: ConfigError }
  | { readonly kind: "declarations"; readonly error: DeclarationError }
  | { readonly kind: "schemas"; readonly path: string; readonly error: SchemaError }
  | { readonly kind: "providers"; readonly path: string; readonly message: string }
  | { readonly kind: "engine"; readonly error: EngineError };

export const formatCliError = (error: CliError): string => {
  switch (error.kind) {
    case "config":
      return `${error.error.field}: ${error.error.message}`;
    case "declarations":
      return `${error.error.path}: ${error.error.message}`;
    case "schemas":
      return `${error.path} (${error.error.field}): ${error.error.message}`;
    case "providers":
      return `${error.path}: ${error.message}`;
    case "engine":
      return formatEngineError(error.error);
  }
};

const readSchemas = async (path: string): Promise<Result<ResourceSchemas, CliError>> => {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(path, "utf-8"));
    return parseSchemas(parsed).mapErr((error): CliError => ({ kind: "schemas", path, error }));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return err({ kind: "schemas", path, error: { field: "root", message } });
  }
};

export const loadProject = async (options: ProjectOptions = {}): Promise<Result<Project, CliError>> => {
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolve(cwd, options.configPath ?? DEFAULT_CONFIG_PATH);
  const config = await readConfig(configPath);
  if (config.isErr()) {
    return err({ kind: "config", error: config.error });
  }

  const root = dirname(configPath);
  const declarations = await readDeclarations(resolve(root, config.value.declarations));
  if (declarations.isErr()) {
    return err({ kind: "declarations", error: declarations.error });
  }

  let schemas: ResourceSchemas = {};
  if (config.value.schemas !== undefined) {
    const loaded = await readSchemas(resolve(root, config.value.schemas));
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    schemas = loaded.value;
  }

  return ok({
    config: config.value,
    root,
    declarations: declarations.value,
    schemas,
    backend: new LocalBackend({ path: resolve(root, config.value.state) }),
  });
};

/**
 * Imports the module named by `providers` in the config. It exports the registry as
 * `default` or as `providers`.
 */
export const loadProviders = async (project: Project): Promise<Result<ProviderRegistry, CliError>> => {
  if (project.config.providers === undefined) {
    return err({ kind: "config", error: { field: "providers", message: "No providers module is configured" } });
  }
  const path = resolve(project.root, project.config.providers);

  let exported: unknown;
  try {
    const module: Record<string, unknown> = await import(pathToFileURL(path).href);
    exported = module["default"] ?? module["providers"];
  } catch (e) {
    return err({ kind: "providers", path, message: e instanceof Error ? e.message : String(e) });
  }

  const parsed = ProviderRegistrySchema.safeParse(exported);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err({
      kind: "providers",
      path,
      message: `${issue?.path.join(".") || "export"}: ${issue?.message ?? "Invalid provider registry"}`,
    });
  }
  return ok(parsed.data);
};

export type RunFlags = {
  readonly destroy?: boolean;
  readonly skipRefresh?: boolean;
  readonly parallelism?: number;
  readonly signal?: AbortSignal;
  readonly onEvent?: (event: EngineEvent) => void;
};

/** Config values with command-line flags layered on top. */
export const engineInput = (
  project: Project,
  providers: ProviderRegistry,
  flags: RunFlags,
): EngineInput => ({
  declarations: project.declarations,
  backend: project.backend,
  providers,
  schemas: project.schemas,
  destroy: flags.destroy ?? false,
  refresh: flags.skipRefresh !== true,
  lockTtlMs: project.config.lockTtlMs,
  parallelism: flags.parallelism ?? project.config.parallelism,
  retry: retryPolicy(project.config),
  ...(project.config.timeoutMs === undefined ? {} : { timeoutMs: project.config.timeoutMs }),
  ...(flags.signal === undefined ? {} : { signal: flags.signal }),
  ...(flags.onEvent === undefined ? {} : { onEvent: flags.onEvent }),
});
