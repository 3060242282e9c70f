/**
 * Droid API v2 Protocol Constants
 *
 * Frame layout: [START, FLAGS, TID?, SID?, DID, CID, SEQ, ERR?, ...DATA, CHK, END]
 * Everything between START and END is escaped.
 */

export const FRAME_BYTES = {
  START: 0x8D,
  END: 0xD8,
  ESCAPE: 0xAB
} as const;

// Second byte of the two-byte sequence that replaces a reserved value
export const ESCAPED_BYTES = {
  START: 0x05,
  END: 0x50,
  ESCAPE: 0x23
} as const;

// START + flags + did + cid + seq + checksum + END
export const MIN_FRAME_LENGTH = 7;

export const PacketFlags = {
  IS_RESPONSE: 0x01,
  REQUESTS_RESPONSE: 0x02,
  REQUESTS_ONLY_ERROR_RESPONSE: 0x04,
  IS_ACTIVITY: 0x08,
  HAS_TARGET_ID: 0x10,
  HAS_SOURCE_ID: 0x20,
  UNUSED: 0x40,
  EXTENDED_FLAGS: 0x80
} as const;

export const ErrorCode = {
  SUCCESS: 0x00,
  BAD_DEVICE_ID: 0x01,
  BAD_COMMAND_ID: 0x02,
  NOT_YET_IMPLEMENTED: 0x03,
  COMMAND_IS_RESTRICTED: 0x04,
  BAD_DATA_LENGTH: 0x05,
  COMMAND_FAILED: 0x06,
  BAD_PARAMETER_VALUE: 0x07,
  BUSY: 0x08,
  BAD_TARGET_ID: 0x09,
  TARGET_UNAVAILABLE: 0x0A
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export const ERROR_CODE_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.SUCCESS]: 'Success',
  [ErrorCode.BAD_DEVICE_ID]: 'Bad device ID',
  [ErrorCode.BAD_COMMAND_ID]: 'Bad command ID',
  [ErrorCode.NOT_YET_IMPLEMENTED]: 'Not yet implemented',
  [ErrorCode.COMMAND_IS_RESTRICTED]: 'Command is restricted',
  [ErrorCode.BAD_DATA_LENGTH]: 'Bad data length',
  [ErrorCode.COMMAND_FAILED]: 'Command failed',
  [ErrorCode.BAD_PARAMETER_VALUE]: 'Bad parameter value',
  [ErrorCode.BUSY]: 'Droid is busy',
  [ErrorCode.BAD_TARGET_ID]: 'Bad target ID',
  [ErrorCode.TARGET_UNAVAILABLE]: 'Target unavailable'
};

const ERROR_CODE_VALUES = new Set<number>(Object.values(ErrorCode));

export function isErrorCode(value: number): value is ErrorCode {
  return ERROR_CODE_VALUES.has(value);
}

export const DeviceId = {
  CORE: 0x00,
  BOOTLOADER: 0x01,
  API_AND_SHELL: 0x10,
  SYSTEM_INFO: 0x11,
  POWER: 0x13,
  DRIVE: 0x16,
  ANIMATRONIC: 0x17,
  SENSOR: 0x18,
  CONNECTION: 0x19,
  IO: 0x1A,
  FIRMWARE: 0x1F
} as const;

export type DeviceId = typeof DeviceId[keyof typeof DeviceId];

export const CoreCommand = {
  PING: 0x00,
  GET_API_PROTOCOL_VERSION: 0x01
} as const;

export const PowerCommand = {
  ENTER_DEEP_SLEEP: 0x00,
  SLEEP: 0x01,
  GET_BATTERY_VOLTAGE: 0x03,
  GET_BATTERY_STATE: 0x04,
  ENABLE_BATTERY_STATE_NOTIFY: 0x05,
  FORCE_BATTERY_REFRESH: 0x0C,
  WAKE: 0x0D,
  GET_BATTERY_PERCENTAGE: 0x10,
  GET_BATTERY_VOLTAGE_STATE: 0x17,
  ENABLE_BATTERY_VOLTAGE_STATE_NOTIFY: 0x1B,
  GET_CHARGER_STATE: 0x1F,
  GET_BATTERY_VOLTAGE_IN_VOLTS: 0x25,
  GET_BATTERY_VOLTAGE_STATE_THRESHOLDS: 0x26
} as const;

export const DriveCommand = {
  SET_RAW_MOTORS: 0x01,
  RESET_YAW: 0x06,
  DRIVE_WITH_HEADING: 0x07,
  GENERIC_RAW_MOTOR: 0x0B,
  SET_STABILIZATION: 0x0C,
  SET_CONTROL_SYSTEM_TYPE: 0x0E,
  SET_CUSTOM_CONTROL_SYSTEM_TIMEOUT: 0x22,
  ENABLE_MOTOR_STALL_NOTIFY: 0x25,
  ENABLE_MOTOR_FAULT_NOTIFY: 0x27,
  GET_MOTOR_FAULT_STATE: 0x29
} as const;

export const AnimatronicCommand = {
  PLAY_ANIMATION: 0x05,
  PERFORM_LEG_ACTION: 0x0D,
  SET_HEAD_POSITION: 0x0F,
  GET_HEAD_POSITION: 0x14,
  SET_LEG_POSITION: 0x15,
  GET_LEG_POSITION: 0x16,
  GET_LEG_ACTION: 0x25,
  ENABLE_LEG_ACTION_NOTIFY: 0x2A,
  STOP_ANIMATION: 0x2B,
  ENABLE_IDLE_ANIMATIONS: 0x2C,
  ENABLE_TROPHY_MODE: 0x2D,
  GET_TROPHY_MODE_ENABLED: 0x2E,
  ENABLE_HEAD_RESET_NOTIFY: 0x39
} as const;

export const IoCommand = {
  SET_LED: 0x04,
  PLAY_AUDIO_FILE: 0x07,
  SET_AUDIO_VOLUME: 0x08,
  GET_AUDIO_VOLUME: 0x09,
  STOP_ALL_AUDIO: 0x0A,
  SET_ALL_LEDS_16_BIT_MASK: 0x0E,
  START_IDLE_LED_ANIMATION: 0x19,
  SET_ALL_LEDS_32_BIT_MASK: 0x1A,
  SET_ALL_LEDS_8_BIT_MASK: 0x1C,
  RELEASE_LED_REQUESTS: 0x4E
} as const;

export const SensorCommand = {
  SET_SENSOR_STREAMING_MASK: 0x00,
  GET_SENSOR_STREAMING_MASK: 0x01,
  SET_EXTENDED_SENSOR_STREAMING_MASK: 0x0C,
  GET_EXTENDED_SENSOR_STREAMING_MASK: 0x0D,
  ENABLE_GYRO_MAX_NOTIFY: 0x0F,
  CONFIGURE_COLLISION_DETECTION: 0x11,
  ENABLE_COLLISION_DETECTED_NOTIFY: 0x14,
  CONFIGURE_STREAMING_SERVICE: 0x39,
  START_STREAMING_SERVICE: 0x3A,
  STOP_STREAMING_SERVICE: 0x3B,
  CLEAR_STREAMING_SERVICE: 0x3C
} as const;

export const SystemInfoCommand = {
  GET_MAIN_APP_VERSION: 0x00,
  GET_BOOTLOADER_VERSION: 0x01,
  GET_BOARD_REVISION: 0x03,
  GET_MAC_ADDRESS: 0x06,
  GET_STATS_ID: 0x13,
  GET_PROCESSOR_NAME: 0x1F,
  GET_SKU: 0x38
} as const;

export const DriveFlags = {
  FORWARD: 0x00,
  BACKWARD: 0x01,
  TURBO: 0x02,
  FAST_TURN: 0x04,
  LEFT_DIRECTION: 0x08,
  RIGHT_DIRECTION: 0x10,
  ENABLE_DRIFT: 0x20
} as const;

export const RawMotorMode = {
  OFF: 0,
  FORWARD: 1,
  REVERSE: 2
} as const;

export type RawMotorMode = typeof RawMotorMode[keyof typeof RawMotorMode];

export const StabilizationMode = {
  DISABLED: 0,
  FULL: 1,
  PITCH_ONLY: 2,
  ROLL_ONLY: 3,
  YAW_ONLY: 4,
  SPEED_AND_YAW: 5
} as const;

export type StabilizationMode = typeof StabilizationMode[keyof typeof StabilizationMode];

export const LegAction = {
  STOP: 0,
  TRIPOD: 1,
  BIPOD: 2,
  WADDLE: 3
} as const;

export type LegAction = typeof LegAction[keyof typeof LegAction];

export const LegState = {
  UNKNOWN: 0,
  TRIPOD: 1,
  BIPOD: 2,
  WADDLE: 3,
  TRANSITIONING: 4
} as const;

export type LegState = typeof LegState[keyof typeof LegState];

export const BatteryState = {
  CHARGED: 0,
  CHARGING: 1,
  NOT_CHARGING: 2,
  OK: 3,
  LOW: 4,
  CRITICAL: 5,
  UNKNOWN: 255
} as const;

export type BatteryState = typeof BatteryState[keyof typeof BatteryState];

export const AudioPlaybackMode = {
  PLAY_IMMEDIATELY: 0,
  PLAY_ONLY_IF_NOT_PLAYING: 1,
  PLAY_AFTER_CURRENT: 2
} as const;

export type AudioPlaybackMode = typeof AudioPlaybackMode[keyof typeof AudioPlaybackMode];

// Bit positions in the 32-bit LED mask
export const Led = {
  FRONT_RED: 0,
  FRONT_GREEN: 1,
  FRONT_BLUE: 2,
  LOGIC_DISPLAYS: 3,
  BACK_RED: 4,
  BACK_GREEN: 5,
  BACK_BLUE: 6,
  HOLO_PROJECTOR: 7
} as const;

export const BLE_UUIDS = {
  API_V2_SERVICE: '00010001-574f-4f20-5370-6865726f2121',
  API_V2: '00010002-574f-4f20-5370-6865726f2121',
  HANDSHAKE: '00020005-574f-4f20-5370-6865726f2121'
} as const;

export const HANDSHAKE_PAYLOAD = 'usetheforce...band';

export const DROID_NAME_PREFIX = 'D2-';

export const TIMING = {
  COMMAND_INTERVAL_MS: 120,
  COMMAND_TIMEOUT_MS: 10000,
  SCAN_TIMEOUT_MS: 10000,
  WRITE_CHUNK_SIZE: 20
} as const;
