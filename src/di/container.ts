import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ProcessRunner } from '../runtime/ports/process-runner.js';
import { NodeProcessRunner } from '../runtime/adapters/node-process-runner.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { LaunchEnv } from '../launch/process-type.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into the launcher.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment the launcher settings are read from (defaults to process.env). */
  readonly env?: LaunchEnv;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const signals: ProcessSignals =
      policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Allow tests to inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const { config, ignored } = loadConfig({ env: options.env ?? process.env });

  if (ignored.length > 0) {
    createBootstrapLogger('config').warn({ ignored }, 'Ignoring invalid launcher settings, using defaults');
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(
        (c) => new PinoLoggerFactory(c.resolve<ValidatedConfig>(DI.Config.App).logging.level)
      ),
    });
  }

  if (!container.isRegistered(DI.Runtime.ProcessRunner)) {
    container.register<ProcessRunner>(DI.Runtime.ProcessRunner, {
      useFactory: instanceCachingFactory(
        (c) =>
          new NodeProcessRunner(
            c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
            c.resolve<ILoggerFactory>(DI.Logging.Factory).create('process-runner')
          )
      ),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 * Idempotent: multiple calls after initialization return immediately.
 * Registrations already present (test fakes) are left in place.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerServices();
  initialized = true;
  createBootstrapLogger('di').debug('Container initialized');
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
