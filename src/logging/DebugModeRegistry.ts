/**
 * Debug Mode Registry
 *
 * Per-component log level overrides: module-scoped state, exported
 * functions, reset for testing.
 *
 * Components register themselves when their module loads (e.g.
 * "reconnect-proxy", "sftp-fs"). Operators can then enable DEBUG/TRACE
 * for one backend without flooding the rest of the output.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface ComponentStatus {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. An existing override is kept.
 */
export function registerComponent(name: string, description: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.description = description;
  } else {
    registry.set(name, { name, description });
  }
}

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    // Auto-register if not yet known
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * The component's override if set, otherwise the global level. Child
 * components ("sftp-fs.stream") inherit their parent's override.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | null = name;
  while (current !== null) {
    const override = registry.get(current)?.levelOverride;
    if (override) {
      return override;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : null;
  }
  return globalLevel;
}

/**
 * Check if a log message at the given level should be emitted for a component.
 */
export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): ComponentStatus[] {
  const result: ComponentStatus[] = [];
  for (const reg of registry.values()) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides like ["sftp-fs", "reconnect-proxy:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      setComponentLevel(name, parseLogLevel(entry.substring(colonIndex + 1), LogLevel.DEBUG));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
