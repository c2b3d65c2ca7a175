/**
 * Container Module
 *
 * Detects whether the prompt runs inside a container-like sandbox and shows
 * its name. Detection walks {@link CONTAINER_PROBES} in order; the first
 * probe that matches decides the name.
 *
 * @module modules/container
 */

import { Ok, parseStyleString } from "@shellmark/shared";
import type { ContainerConfig } from "../config/index.js";
import type { Context } from "../context/index.js";
import { formatTemplate, type TemplateResolvers } from "../formatter/index.js";
import { Logger } from "../logger/index.js";
import type { Module } from "./types.js";

// =============================================================================
// Probes
// =============================================================================

/**
 * Outcome of a single probe: a display name, or a reason to keep looking.
 */
export type ProbeVerdict =
  | { readonly kind: "match"; readonly name: string }
  | { readonly kind: "skip"; readonly reason: string };

export interface ContainerProbe {
  readonly name: string;
  detect(context: Context, config: ContainerConfig, logger: Logger): ProbeVerdict;
}

const match = (name: string): ProbeVerdict => ({ kind: "match", name });
const skip = (reason: string): ProbeVerdict => ({ kind: "skip", reason });

/**
 * Name used when `/run/.containerenv` exists but has no usable line.
 */
export const CONTAINERENV_FALLBACK_NAME = "podman";

/**
 * Pull the display name out of `/run/.containerenv` content.
 *
 * Image names are reduced to the part after the last `/`, which drops the
 * registry and repository path: `registry.example.org/fedora-toolbox:35`
 * becomes `fedora-toolbox:35`.
 */
export function parseContainerEnv(content: string, useContainerName: boolean): string {
  const prefix = useContainerName ? "name=" : "image=";

  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith(prefix)) continue;

    const value = line.slice(prefix.length).replace(/^"+|"+$/g, "");
    if (useContainerName) {
      return value;
    }
    return value.slice(value.lastIndexOf("/") + 1);
  }

  return CONTAINERENV_FALLBACK_NAME;
}

const openVzProbe: ContainerProbe = {
  name: "openvz",
  detect(context) {
    if (!context.exists("/proc/vz")) return skip("/proc/vz not found");
    // /proc/bc only exists on the OpenVZ host node, not inside containers
    if (context.exists("/proc/bc")) return skip("/proc/bc present");
    return match("OpenVZ");
  },
};

const ociProbe: ContainerProbe = {
  name: "oci",
  detect(context) {
    return context.exists("/run/host/container-manager")
      ? match("OCI")
      : skip("/run/host/container-manager not found");
  },
};

const containerEnvProbe: ContainerProbe = {
  name: "containerenv",
  detect(context, config, logger) {
    if (!context.exists("/run/.containerenv")) return skip("/run/.containerenv not found");

    const content = context.tryReadText("/run/.containerenv");
    if (!content.ok) {
      logger.debug(content.error.message, content.error.toJSON());
      return skip("/run/.containerenv unreadable");
    }

    return match(parseContainerEnv(content.value, config.useContainerName));
  },
};

const systemdProbe: ContainerProbe = {
  name: "systemd",
  detect(context) {
    const content = context.readText("/run/systemd/container");
    if (content === undefined) return skip("/run/systemd/container not readable");

    switch (content.trim()) {
      case "docker":
        return match("Docker");
      // WSL with systemd writes "wsl" here, and WSL is not a container
      case "wsl":
        return skip("systemd reports wsl");
      default:
        return match("Systemd");
    }
  },
};

const dockerEnvProbe: ContainerProbe = {
  name: "dockerenv",
  detect(context) {
    return context.exists("/.dockerenv") ? match("Docker") : skip("/.dockerenv not found");
  },
};

/**
 * Probes in priority order.
 *
 * 1. OpenVZ and OCI markers: unambiguous and cheapest.
 * 2. `/run/.containerenv`: once present it decides, even on a fallback name.
 * 3. `/run/systemd/container`: generic; `wsl` is suppressed.
 * 4. `/.dockerenv`.
 */
export const CONTAINER_PROBES: readonly ContainerProbe[] = [
  openVzProbe,
  ociProbe,
  containerEnvProbe,
  systemdProbe,
  dockerEnvProbe,
];

/**
 * Find the container display name, or undefined when not in a container.
 * Container markers are Linux-specific, so other platforms never match.
 */
export function detectContainer(
  context: Context,
  config: ContainerConfig,
  logger: Logger = new Logger()
): string | undefined {
  if (context.platform !== "linux") {
    logger.trace(`container detection skipped on ${context.platform}`);
    return undefined;
  }

  for (const probe of CONTAINER_PROBES) {
    const verdict = probe.detect(context, config, logger);
    if (verdict.kind === "match") {
      logger.trace(`probe ${probe.name} matched`, { name: verdict.name });
      return verdict.name;
    }
    logger.trace(`probe ${probe.name} skipped`, { reason: verdict.reason });
  }

  return undefined;
}

// =============================================================================
// Module
// =============================================================================

/**
 * Build the `container` module.
 *
 * A broken `format` or `style` never escapes this function: the error is
 * logged as a warning and the module is left out of the prompt.
 */
export function containerModule(
  context: Context,
  config: ContainerConfig,
  logger: Logger
): Module | undefined {
  if (config.disabled) {
    return undefined;
  }

  const name = detectContainer(context, config, logger.child({ module: "container" }));
  if (name === undefined) {
    return undefined;
  }

  return formatContainer(name, config, logger);
}

/**
 * Render an already detected container name through the configured format.
 */
export function formatContainer(
  name: string,
  config: ContainerConfig,
  logger: Logger
): Module | undefined {
  const resolvers: TemplateResolvers = {
    meta: (variable) => (variable === "symbol" ? Ok(config.symbol) : undefined),
    style: (variable) => (variable === "style" ? parseStyleString(config.style) : undefined),
    variable: (variable) => (variable === "name" ? Ok(name) : undefined),
  };

  const segments = formatTemplate(config.format, resolvers);
  if (!segments.ok) {
    const message = `Error in module \`container\`:\n${segments.error.message}`;
    logger.child({ module: "container" }).warn(message);
    return undefined;
  }

  return { name: "container", segments: segments.value };
}
