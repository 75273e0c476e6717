/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in di/container.ts (factory or value)
 * 3. Use @inject(DI.YourToken) or container.resolve(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // HOST (the CAD application the add-in lives in)
  // ═══════════════════════════════════════════════════════════════════
  Host: {
    /** HostApplication port: custom event registration and firing */
    Application: Symbol('Host.Application'),
    /** ThreadContext: which side of the main-thread boundary code runs on */
    Threads: Symbol('Host.Threads'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // BRIDGE (main-thread marshaling)
  // ═══════════════════════════════════════════════════════════════════
  Bridge: {
    /** Method name -> handler, frozen at server start */
    Registry: Symbol('Bridge.Registry'),
    /** Calls parked for the main thread */
    PendingCalls: Symbol('Bridge.PendingCalls'),
    /** Stale pending-call eviction */
    Sweeper: Symbol('Bridge.Sweeper'),
    /** Runs handlers on the main thread */
    Dispatcher: Symbol('Bridge.Dispatcher'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVER
  // ═══════════════════════════════════════════════════════════════════
  Server: {
    /** Socket server lifecycle */
    Bridge: Symbol('Server.Bridge'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // ADD-IN
  // ═══════════════════════════════════════════════════════════════════
  Addin: {
    /** Handler modules registered at run() */
    Modules: Symbol('Addin.Modules'),
    /** run/stop entry points */
    Entry: Symbol('Addin.Entry'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory: component child loggers */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (addin/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling, etc) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** Wall clock */
    Clock: Symbol('Runtime.Clock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete add-in configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

