// =============================================================================
// CoBridge - Digital I/O
// =============================================================================

import { OP, DIRECTION, PULL, DRIVE_MODE, PIN_ERR } from '@cobridge/kernel'
import type {
  Direction,
  DriveMode,
  GpioSetDirectionRequest,
  GpioSetPullRequest,
  GpioSetRequest,
  HardwareBridge,
  Pull,
  RequestOptions
} from '@cobridge/kernel'
import { Peripheral, unexpectedResponse } from './peripheral'

/**
 * One GPIO pin.
 *
 * Claimed as an input with no pull. Value and configuration changes go to
 * the host as requests; the current configuration is read back from the
 * shared pin registry.
 *
 * @example
 * ```typescript
 * const led = new DigitalInOut(bridge, 5)
 * await led.switchToOutput(true)
 * await led.setValue(false)
 * led.deinit()
 * ```
 */
export class DigitalInOut extends Peripheral {
  protected override readonly label = 'DigitalInOut'
  private readonly requestOptions: RequestOptions

  constructor(
    bridge: HardwareBridge,
    readonly pin: number,
    options: RequestOptions = {}
  ) {
    super(bridge)
    const code = bridge.pins.claim(pin)
    if (code === PIN_ERR.IN_USE) throw new Error(`Pin ${pin} in use`)
    if (code !== PIN_ERR.OK) throw new Error(`Invalid pin ${pin}`)
    this.requestOptions = options
  }

  // ===========================================================================
  // Direction
  // ===========================================================================

  get direction(): Direction {
    this.checkAlive()
    return this.bridge.pins.getDirection(this.pin) === DIRECTION.OUTPUT ? DIRECTION.OUTPUT : DIRECTION.INPUT
  }

  /**
   * Drive the pin. The drive mode is set before the pin starts driving.
   */
  async switchToOutput(value: boolean = false, driveMode: DriveMode = DRIVE_MODE.PUSH_PULL): Promise<void> {
    this.checkAlive()
    this.bridge.pins.setDriveMode(this.pin, driveMode)
    await this.send({ op: OP.GPIO_SET_DIRECTION, pin: this.pin, direction: DIRECTION.OUTPUT })
    await this.send({ op: OP.GPIO_SET, pin: this.pin, value })
  }

  async switchToInput(pull: Pull = PULL.NONE): Promise<void> {
    this.checkAlive()
    await this.send({ op: OP.GPIO_SET_DIRECTION, pin: this.pin, direction: DIRECTION.INPUT })
    await this.send({ op: OP.GPIO_SET_PULL, pin: this.pin, pull })
  }

  // ===========================================================================
  // Value
  // ===========================================================================

  async getValue(): Promise<boolean> {
    this.checkAlive()
    const response = await this.bridge.request({ op: OP.GPIO_GET, pin: this.pin }, this.requestOptions)
    if (response.op !== OP.GPIO_GET) throw unexpectedResponse(this.label)
    return response.value
  }

  /**
   * @throws Error when the pin is an input
   */
  async setValue(value: boolean): Promise<void> {
    if (this.direction === DIRECTION.INPUT) {
      throw new Error('Cannot set value when direction is input')
    }
    await this.send({ op: OP.GPIO_SET, pin: this.pin, value })
  }

  // ===========================================================================
  // Pull and drive mode
  // ===========================================================================

  get pull(): Pull | null {
    if (this.direction === DIRECTION.OUTPUT) return null
    const pull = this.bridge.pins.getPull(this.pin)
    if (pull === PULL.UP) return PULL.UP
    if (pull === PULL.DOWN) return PULL.DOWN
    return PULL.NONE
  }

  /**
   * @throws Error when the pin is an output
   */
  async setPull(pull: Pull): Promise<void> {
    if (this.direction === DIRECTION.OUTPUT) {
      throw new Error('Pull not used when direction is output')
    }
    await this.send({ op: OP.GPIO_SET_PULL, pin: this.pin, pull })
  }

  get driveMode(): DriveMode | null {
    if (this.direction === DIRECTION.INPUT) return null
    return this.bridge.pins.getDriveMode(this.pin) === DRIVE_MODE.OPEN_DRAIN
      ? DRIVE_MODE.OPEN_DRAIN
      : DRIVE_MODE.PUSH_PULL
  }

  /**
   * @throws Error when the pin is an input
   */
  setDriveMode(mode: DriveMode): void {
    if (this.direction === DIRECTION.INPUT) {
      throw new Error('Drive mode not used when direction is input')
    }
    this.bridge.pins.setDriveMode(this.pin, mode)
  }

  /**
   * Keep the pin claimed across soft resets.
   */
  neverReset(): void {
    this.checkAlive()
    this.bridge.pins.markNeverReset(this.pin)
  }

  protected override release(): void {
    this.bridge.pins.deinit(this.pin)
  }

  private async send(params: GpioSetRequest | GpioSetDirectionRequest | GpioSetPullRequest): Promise<void> {
    await this.bridge.request(params, this.requestOptions)
  }
}
