/**
 * Imou Life API Constants
 */

export const DEFAULT_API_URL = 'https://openapi.easy4ip.com/openapi';
export const API_VERSION = '1.0';

/** Regional endpoints published by Imou, keyed by region */
export const API_URLS: Readonly<Record<string, string>> = {
  default: DEFAULT_API_URL,
  singapore: 'https://openapi-sg.easy4ip.com/openapi',
  oregon: 'https://openapi-or.easy4ip.com/openapi',
  frankfurt: 'https://openapi-fk.easy4ip.com/openapi',
};

// Timeouts (in milliseconds)
export const DEFAULT_TIMEOUT = 10000;

/** Tokens are refreshed this long before the vendor-reported expiry */
export const TOKEN_REFRESH_MARGIN = 60_000;

/** Window searched for the latest alarm (ms) */
export const ALARM_LOOKBACK = 30 * 24 * 60 * 60 * 1000;

export const MANUFACTURER = 'Imou';

// Vendor result codes
export const SUCCESS_CODE = '0';

/** Codes meaning the appId/appSecret pair was refused */
export const AUTH_ERROR_CODES: ReadonlySet<string> = new Set(['OP1008', 'OP1009', 'SN1001']);

/** Codes meaning the access token itself was refused */
export const TOKEN_ERROR_CODES: ReadonlySet<string> = new Set(['TK1001', 'TK1002', 'TK1003']);

// User-friendly messages for known vendor codes
export const ERROR_MESSAGES: Record<string, string> = {
  OP1008: 'Invalid appId. Please check the appId in the Imou developer console.',
  OP1009: 'The application has no permission for this operation.',
  SN1001: 'Invalid signature. Please check the appSecret.',
  TK1001: 'Access token is invalid.',
  TK1002: 'Access token has expired.',
  TK1003: 'Access token does not match this application.',
  DV1007: 'Device is offline.',
  DV1030: 'Device does not support this capability.',
  OP1011: 'Too many requests. Please try again later.',
};

/**
 * Camera features that can be toggled through getDeviceCameraStatus/setDeviceCameraStatus.
 * The key is the vendor "enableType", matched against a device's capability list.
 */
export const IMOU_SWITCHES: Readonly<Record<string, string>> = {
  motionDetect: 'Motion Detection',
  headerDetect: 'Human Detection',
  abAlarmSound: 'Abnormal Alarm Sound',
  breathingLight: 'Breathing Light',
  closeCamera: 'Close Camera',
  linkageSiren: 'Siren on Motion',
  whiteLight: 'White Light',
  smartTrack: 'Smart Track',
  smartLocate: 'Smart Locate',
  localRecord: 'Local Record',
  autoZoomFocus: 'Auto Zoom Focus',
  infraredLight: 'Infrared Light',
};

export const SENSORS: Readonly<Record<string, string>> = {
  lastAlarm: 'Last Alarm',
};

export const BINARY_SENSORS: Readonly<Record<string, string>> = {
  online: 'Online',
};

/** Descriptions of capabilities reported in the device "ability" field */
export const IMOU_CAPABILITIES: Readonly<Record<string, string>> = {
  WLAN: 'Supports access to wireless local area network',
  MT: 'Supports motion detection',
  HSEncrypt: 'Device supports stream encryption',
  CloudStorage: 'Supports cloud storage',
  LocalStorage: 'Supports device local storage',
  PT: 'Supports PTZ operations',
  AudioEncodeControl: 'Supports audio encoding control',
  FrameReverse: 'Supports flipping the picture',
  RemoteControl: 'Supports remote linkage',
  Dormant: 'Supports sleep mode',
  Siren: 'Supports siren',
  WhiteLight: 'Supports white light',
  SmartTrack: 'Supports smart tracking',
  AlarmMD: 'Supports motion detection alarm',
  HeaderDetect: 'Supports human detection',
  CollectionPoint: 'Supports collection points',
  TimeFormat: 'Supports time format setting',
  Reboot: 'Supports device restart',
  LocalRecord: 'Supports local recording',
  CloseCamera: 'Supports turning the camera off',
  BreathingLight: 'Supports breathing light',
  AbAlarmSound: 'Supports abnormal sound alarm',
  InfraredLight: 'Supports infrared light',
  motionDetect: 'Motion detection switch',
};
