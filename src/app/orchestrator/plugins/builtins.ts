import { FmfDiscover } from "./discover-fmf.js";
import { ShellDiscover } from "./discover-shell.js";
import { TmtExecute } from "./execute-tmt.js";
import { InstallPhase, ShellPhase } from "./guest-phase.js";
import {
  ConnectProvision,
  ContainerProvision,
  LocalProvision,
  restoreConnectGuest,
  restoreContainerGuest,
  restoreLocalGuest,
} from "./provision.js";
import { globalRegistry, type PluginRegistry } from "./registry.js";
import { DisplayReport } from "./report-display.js";

export function registerBuiltinPlugins(registry: PluginRegistry): PluginRegistry {
  registry.register("discover", "fmf", (phase) => new FmfDiscover(phase));
  registry.register("discover", "shell", (phase) => new ShellDiscover(phase));

  registry.register("provision", "local", (phase) => new LocalProvision(phase));
  registry.register("provision", "connect", (phase) => new ConnectProvision(phase));
  registry.register("provision", "container", (phase) => new ContainerProvision(phase));
  registry.registerGuest("local", restoreLocalGuest);
  registry.registerGuest("connect", restoreConnectGuest);
  registry.registerGuest("container", restoreContainerGuest);

  registry.register("prepare", "shell", (phase) => new ShellPhase("prepare", phase));
  registry.register("prepare", "install", (phase) => new InstallPhase(phase));

  registry.register("execute", "tmt", (phase) => new TmtExecute(phase));

  registry.register("report", "display", (phase) => new DisplayReport(phase));

  registry.register("finish", "shell", (phase) => new ShellPhase("finish", phase));

  return registry;
}

let builtinsRegistered = false;

/** The global registry with the built-in plugins loaded once. */
export function defaultRegistry(): PluginRegistry {
  if (!builtinsRegistered) {
    registerBuiltinPlugins(globalRegistry);
    builtinsRegistered = true;
  }
  return globalRegistry;
}
