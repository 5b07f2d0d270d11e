// =============================================================================
// CoBridge - HAL
// =============================================================================
// Peripheral objects an interpreter's bindings call. Every operation is a
// bridged request and resolves once the host has completed it.

export { Peripheral, BusPeripheral, LockableBusPeripheral } from './peripheral'
export type { BusPeripheralOptions, Slice, DuplexSlices } from './peripheral'
export { DigitalInOut } from './digital-io'
export { AnalogIn, AnalogOut } from './analog-io'
export { I2C } from './i2c'
export type { I2COptions } from './i2c'
export { SPI } from './spi'
export type { SPIOptions, SPIConfiguration, ReadSlice } from './spi'
export { UART } from './uart'
export type { UARTOptions } from './uart'
export { sleep, monotonic } from './time'
