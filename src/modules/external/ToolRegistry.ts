/**
 * External tool registry.
 * Maintains a whitelist of allowed external tools with their specifications.
 * Only registered tools can be invoked through ExternalToolRunner.
 */

import type { DecompilerConfig } from '../../types/index.js';
import { ToolError } from '../../errors/ToolError.js';
import type { ExternalToolName, ExternalToolSpec } from './types.js';
import { probeCommand, type ProbeResult } from './ToolProbe.js';
import { logger } from '../../utils/logger.js';

export function createDefaultSpecs(config: DecompilerConfig): ExternalToolSpec[] {
  return [
    {
      name: 'luau.decompiler',
      command: config.luau.command,
      versionArgs: ['--version'],
      required: true,
    },
    {
      name: 'luajit.decompiler',
      command: config.luajit.command,
      versionArgs: ['--version'],
      required: false,
    },
  ];
}

export class ToolRegistry {
  private specs = new Map<ExternalToolName, ExternalToolSpec>();
  private probeCache = new Map<ExternalToolName, ProbeResult>();
  private probeCacheExpiry = 0;
  private readonly PROBE_CACHE_TTL = 60_000; // 1 minute

  constructor(specs: ExternalToolSpec[]) {
    for (const spec of specs) {
      this.specs.set(spec.name, spec);
    }
  }

  static fromConfig(config: DecompilerConfig): ToolRegistry {
    return new ToolRegistry(createDefaultSpecs(config));
  }

  /**
   * Get the spec for a tool. Throws if not registered.
   */
  getSpec(name: ExternalToolName): ExternalToolSpec {
    const spec = this.specs.get(name);
    if (!spec) {
      throw new ToolError('VALIDATION', `Tool '${name}' is not registered in the allowlist`);
    }
    return spec;
  }

  getRegisteredTools(): ExternalToolName[] {
    return Array.from(this.specs.keys());
  }

  /**
   * Probe all registered tools for availability. Results are cached.
   */
  async probeAll(force = false): Promise<Map<ExternalToolName, ProbeResult>> {
    const now = Date.now();
    if (!force && this.probeCache.size > 0 && now < this.probeCacheExpiry) {
      return new Map(this.probeCache);
    }

    await Promise.all(
      Array.from(this.specs, async ([name, spec]) => {
        const result = await probeCommand(spec.command, spec.versionArgs);
        this.probeCache.set(name, result);
        if (result.available) {
          logger.debug(`[ToolProbe] ${spec.command}: available at ${result.path} (${result.version || 'unknown version'})`);
        } else {
          logger.debug(`[ToolProbe] ${spec.command}: not available (${result.reason})`);
        }
      })
    );
    this.probeCacheExpiry = now + this.PROBE_CACHE_TTL;

    const available = Array.from(this.probeCache.values()).filter((r) => r.available).length;
    logger.info(`[ToolRegistry] Probed ${this.specs.size} tools: ${available} available`);

    return new Map(this.probeCache);
  }

  getCachedProbe(name: ExternalToolName): ProbeResult | undefined {
    return this.probeCache.get(name);
  }
}
