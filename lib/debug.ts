import debugModule from 'debug';

export const DEBUG_NAMESPACE = 'video-upload';

// Off unless DEBUG=video-upload or setDebugMode(true)
let isDebugEnabled: boolean = debugModule.enabled(DEBUG_NAMESPACE);

const debugInstance = debugModule(DEBUG_NAMESPACE);

/**
 * Enable or disable debug output for the client library
 */
export function setDebugMode(enable: boolean): void {
  isDebugEnabled = enable;

  if (enable) {
    debugModule.enable(DEBUG_NAMESPACE);
  } else {
    debugModule.disable();
  }
}

export function isDebugModeEnabled(): boolean {
  return isDebugEnabled;
}

/**
 * Log messages only when debug mode is enabled
 */
export function log(message: string, ...args: unknown[]): void {
  if (isDebugEnabled) {
    debugInstance(message, ...args);
  }
}
