export class AlertIngestError extends Error {
  readonly code: string = 'ALERT_INGEST_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'AlertIngestError';
  }
}

export class AlertMetadataError extends AlertIngestError {
  override readonly code = 'ALERT_METADATA_INVALID';
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Malformed alert metadata at ${field}: ${message}`);
    this.name = 'AlertMetadataError';
    this.field = field;
  }
}

export class AlertDirectoryError extends AlertIngestError {
  override readonly code = 'ALERT_DIRECTORY_INVALID';
  readonly alertDir: string;

  constructor(alertDir: string, message: string) {
    super(`${alertDir}: ${message}`);
    this.name = 'AlertDirectoryError';
    this.alertDir = alertDir;
  }
}

export class SettingsError extends AlertIngestError {
  override readonly code = 'SETTINGS_INVALID';
  readonly settingsPath: string | null;

  constructor(message: string, settingsPath: string | null = null) {
    super(message);
    this.name = 'SettingsError';
    this.settingsPath = settingsPath;
  }
}
