/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

export interface AppConfig {
  chromePath: string;
  paths: {
    logFile: string;
    defaultTag: string;
  };
  renderer: {
    timeoutSeconds: number;
    killGraceMs: number;
  };
  probe: {
    enabled: boolean;
    timeoutSeconds: number;
  };
  archive: {
    endpoint: string;
    timeoutSeconds: number;
  };
  pipeline: {
    enableFinalRetry: boolean;
  };
}

export const config: AppConfig = {
  // Bare names are looked up on PATH
  chromePath: 'chrome',

  paths: {
    // Durable warning log (relative to the working directory)
    logFile: 'url_retrieval.log',
    // Folder for links without tags
    defaultTag: 'Unlabeled',
  },

  renderer: {
    timeoutSeconds: 25,
    // SIGTERM -> SIGKILL escalation
    killGraceMs: 2_000,
  },

  probe: {
    enabled: true,
    timeoutSeconds: 10,
  },

  archive: {
    endpoint: 'http://archive.org/wayback/available',
    timeoutSeconds: 10,
  },

  pipeline: {
    enableFinalRetry: true,
  },
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.paths);
Object.freeze(config.renderer);
Object.freeze(config.probe);
Object.freeze(config.archive);
Object.freeze(config.pipeline);
