/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by dependency level, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the level it belongs to
 * 2. Register a factory in container.ts (only when not already registered,
 *    so tests can pre-register fakes)
 * 3. Resolve through `container.resolve<YourType>(DI.YourToken)`
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LEVEL 1: PRIMITIVES (no dependencies)
  // ═══════════════════════════════════════════════════════════════════
  Primitives: {
    FileSystem: Symbol('Primitives.FileSystem'),
    StateDir: Symbol('Primitives.StateDir'),
    TimeClock: Symbol('Primitives.TimeClock'),
    Sleep: Symbol('Primitives.Sleep'),
    ProcessRunner: Symbol('Primitives.ProcessRunner'),
    FileHasher: Symbol('Primitives.FileHasher'),
    SecretSealer: Symbol('Primitives.SecretSealer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LEVEL 2: ADAPTERS (external systems behind ports)
  // ═══════════════════════════════════════════════════════════════════
  Adapters: {
    ObjectStore: Symbol('Adapters.ObjectStore'),
    ContainerRuntime: Symbol('Adapters.ContainerRuntime'),
    DatabaseDumper: Symbol('Adapters.DatabaseDumper'),
    Archiver: Symbol('Adapters.Archiver'),
    ChangeTokens: Symbol('Adapters.ChangeTokens'),
    SnapshotLock: Symbol('Adapters.SnapshotLock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LEVEL 3: ENGINE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Engine: {
    RemoteClient: Symbol('Engine.RemoteClient'),
    NamespaceGate: Symbol('Engine.NamespaceGate'),
    ConfigBundler: Symbol('Engine.ConfigBundler'),
    RestoreApplier: Symbol('Engine.RestoreApplier'),
  },
} as const;

