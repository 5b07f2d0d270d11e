// =============================================================================
// CoBridge - Kernel
// =============================================================================
// Shared-memory request bridge between a cooperative interpreter and its host.

// Layout and codes
export {
  BRIDGE_MAGIC,
  BRIDGE_VERSION,
  INVALID_ID,
  MAX_REQUEST_ID,
  MAX_PAYLOAD,
  TICKS_PER_MS,
  DEFAULT_SLOT_CAPACITY,
  DEFAULT_PIN_COUNT,
  DEFAULT_I2C_BUS_COUNT,
  DEFAULT_SPI_BUS_COUNT,
  DEFAULT_UART_BUS_COUNT,
  DEFAULT_CPU_FREQUENCY_HZ,
  HDR,
  CLOCK,
  CLOCK_MODE,
  SLOT,
  SLOT_STATUS,
  SLOT_FLAG,
  PIN,
  DIRECTION,
  PULL,
  DRIVE_MODE,
  ANALOG,
  ANALOG_MID_SCALE,
  BUS,
  BUS_KIND,
  PARITY,
  NO_PIN,
  BUS_HANDLE,
  MAX_I2C_ADDRESS,
  MAX_CHIP_SELECT,
  DEFAULT_I2C_FREQUENCY,
  DEFAULT_SPI_BAUDRATE,
  DEFAULT_UART_BAUDRATE,
  UART_BUFFER_SIZE,
  DEVICE_REGISTER_COUNT,
  OP,
  TABLE_ERR,
  CLOCK_ERR,
  PIN_ERR,
  BUS_ERR,
  HOST_ERR,
  calculateBridgeSize,
  isOpcode
} from './constants'
export type {
  Opcode,
  SlotStatus,
  ClockMode,
  Direction,
  Pull,
  DriveMode,
  BusKind,
  Parity,
  HostErrorCode
} from './constants'

// Buffer lifecycle
export { createBridgeSAB, validateBridgeSAB, getBridgeConfig, DEFAULT_BRIDGE_CONFIG } from './init'

// Views
export { RequestTable } from './request-table'
export { HostPort } from './host-port'
export { VirtualClock } from './virtual-clock'
export { PinRegistry } from './pin-registry'
export type { PinState } from './pin-registry'
export { AnalogRegistry } from './analog-registry'
export { BusRegistry, RegisterDevice } from './bus-registry'
export type { BusPins, BusConfig, BusState } from './bus-registry'

// Cooperative waiting
export { YieldHook } from './yield-hook'
export type { YieldHookOptions } from './yield-hook'
export { blockingWait } from './blocking-wait'

// Payloads
export {
  encodeParams,
  decodeParams,
  encodeResponse,
  decodeResponse,
  responseCapacity,
  BUS_HEADER_BYTES
} from './protocol'
export type {
  RequestParams,
  ResponsePayload,
  AckOpcode,
  DataOpcode,
  GpioSetRequest,
  GpioGetRequest,
  GpioSetDirectionRequest,
  GpioSetPullRequest,
  AnalogReadRequest,
  AnalogWriteRequest,
  I2CWriteRequest,
  I2CReadRequest,
  I2CWriteReadRequest,
  I2CProbeRequest,
  SpiConfigureRequest,
  SpiWriteRequest,
  SpiReadRequest,
  SpiTransferRequest,
  SleepRequest,
  MonotonicRequest,
  UartWriteRequest,
  UartReadRequest,
  UartSetBaudrateRequest,
  UartRxAvailableRequest,
  UartClearRxRequest,
  AckResponse,
  GpioValueResponse,
  AnalogValueResponse,
  DataResponse,
  ProbeResponse,
  MonotonicResponse,
  UartWrittenResponse,
  UartAvailableResponse
} from './protocol'

// Errors
export { BridgeError, isBridgeError } from './errors'
export type { BridgeErrorKind } from './errors'

// Context object
export { HardwareBridge } from './bridge'
export type { HardwareBridgeOptions, RequestOptions, BridgeLayout, SoftResetResult } from './bridge'

export type {
  RequestId,
  BusHandle,
  BridgeConfig,
  RegionLayout,
  RequestSlot,
  TableStats,
  HostCompleter,
  WaitOutcome,
  BackgroundTask,
  SuspendFn,
  TimelineEntry,
  ClockStats
} from './types'
