export class QuickCaptureError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QuickCaptureError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The backing text file could not be read or written. */
export class IOError extends QuickCaptureError {
  public readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, 'IO_ERROR', options);
    this.name = 'IOError';
    this.path = path;
  }
}

export class MalformedMarkerError extends QuickCaptureError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'MALFORMED_MARKER', options);
    this.name = 'MalformedMarkerError';
  }
}

export class FocusRaceError extends QuickCaptureError {
  public readonly target: string;

  constructor(target: string, message: string, options?: ErrorOptions) {
    super(message, 'FOCUS_RACE', options);
    this.name = 'FocusRaceError';
    this.target = target;
  }
}

export class SettingsError extends QuickCaptureError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SETTINGS_ERROR', options);
    this.name = 'SettingsError';
  }
}

export class ConfigError extends QuickCaptureError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
