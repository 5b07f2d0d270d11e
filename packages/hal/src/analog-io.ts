// =============================================================================
// CoBridge - Analog I/O
// =============================================================================

import { OP, PIN_ERR } from '@cobridge/kernel'
import type { HardwareBridge, RequestOptions } from '@cobridge/kernel'
import { Peripheral, unexpectedResponse } from './peripheral'

/** Full-scale value of both converters */
const ANALOG_MAX = 0xffff

function claimAnalog(bridge: HardwareBridge, pin: number, isOutput: boolean): void {
  const code = bridge.analog.init(pin, isOutput)
  if (code === PIN_ERR.IN_USE) throw new Error(`Pin ${pin} in use`)
  if (code !== PIN_ERR.OK) throw new Error(`Invalid pin ${pin}`)
}

/**
 * ADC input. Values are 16-bit regardless of the converter's resolution.
 */
export class AnalogIn extends Peripheral {
  protected override readonly label = 'AnalogIn'
  readonly referenceVoltage: number

  constructor(
    bridge: HardwareBridge,
    readonly pin: number,
    private readonly requestOptions: RequestOptions = {},
    referenceVoltage: number = 3.3
  ) {
    super(bridge)
    claimAnalog(bridge, pin, false)
    this.referenceVoltage = referenceVoltage
  }

  async getValue(): Promise<number> {
    this.checkAlive()
    const response = await this.bridge.request({ op: OP.ANALOG_READ, pin: this.pin }, this.requestOptions)
    if (response.op !== OP.ANALOG_READ) throw unexpectedResponse(this.label)
    return response.value
  }

  /**
   * Reading scaled to volts against `referenceVoltage`.
   */
  async getVoltage(): Promise<number> {
    return ((await this.getValue()) * this.referenceVoltage) / ANALOG_MAX
  }

  protected override release(): void {
    this.bridge.analog.deinit(this.pin)
  }
}

/**
 * DAC output.
 */
export class AnalogOut extends Peripheral {
  protected override readonly label = 'AnalogOut'

  constructor(
    bridge: HardwareBridge,
    readonly pin: number,
    private readonly requestOptions: RequestOptions = {}
  ) {
    super(bridge)
    claimAnalog(bridge, pin, true)
  }

  /**
   * @throws RangeError unless `value` is an integer in 0..65535
   */
  async setValue(value: number): Promise<void> {
    this.checkAlive()
    if (!Number.isInteger(value) || value < 0 || value > ANALOG_MAX) {
      throw new RangeError('AnalogOut is only 16 bits')
    }
    await this.bridge.request({ op: OP.ANALOG_WRITE, pin: this.pin, value }, this.requestOptions)
  }

  protected override release(): void {
    this.bridge.analog.deinit(this.pin)
  }
}
