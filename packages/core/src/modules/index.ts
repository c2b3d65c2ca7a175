export type { ContainerProbe, ProbeVerdict } from "./container.js";
export {
  CONTAINER_PROBES,
  CONTAINERENV_FALLBACK_NAME,
  containerModule,
  detectContainer,
  formatContainer,
  parseContainerEnv,
} from "./container.js";
export { listModules, MODULES, renderModule } from "./registry.js";
export type { Module, ModuleRenderer } from "./types.js";
