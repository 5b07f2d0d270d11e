// =============================================================================
// CoBridge - Pin and Analog Registry Tests
// =============================================================================

import {
  PinRegistry,
  AnalogRegistry,
  createBridgeSAB,
  DIRECTION,
  PULL,
  DRIVE_MODE,
  PIN_ERR,
  PIN,
  ANALOG_MID_SCALE
} from '../index'

function createPins(pinCount = 16): PinRegistry {
  return new PinRegistry(createBridgeSAB({ pinCount, slotCapacity: 1 }))
}

function outputPin(pins: PinRegistry, pin: number): void {
  pins.claim(pin)
  pins.setDirection(pin, DIRECTION.OUTPUT)
}

describe('PinRegistry lifecycle', () => {
  it('claims a pin once', () => {
    const pins = createPins()
    expect(pins.claim(3)).toBe(PIN_ERR.OK)
    expect(pins.claim(3)).toBe(PIN_ERR.IN_USE)
    expect(pins.isClaimed(3)).toBe(true)
  })

  it('rejects out-of-range pins', () => {
    const pins = createPins(16)
    expect(pins.claim(16)).toBe(PIN_ERR.INVALID_PIN)
    expect(pins.claim(-1)).toBe(PIN_ERR.INVALID_PIN)
    expect(pins.getValue(99)).toBe(PIN_ERR.INVALID_PIN)
  })

  it('disabled pins reject reads and writes until claimed again', () => {
    const pins = createPins()
    outputPin(pins, 2)
    pins.deinit(2)

    expect(pins.getValue(2)).toBe(PIN_ERR.DISABLED)
    expect(pins.setValue(2, true)).toBe(PIN_ERR.DISABLED)
    expect(pins.setDirection(2, DIRECTION.OUTPUT)).toBe(PIN_ERR.DISABLED)
    expect(pins.claim(2)).toBe(PIN_ERR.OK)
  })
})

describe('PinRegistry values', () => {
  it('reads back the last output value', () => {
    const pins = createPins()
    outputPin(pins, 5)
    expect(pins.setValue(5, true)).toBe(PIN_ERR.OK)
    expect(pins.getValue(5)).toBe(1)
    pins.setValue(5, false)
    expect(pins.getValue(5)).toBe(0)
  })

  it('refuses output writes on an input pin and leaves the latch alone', () => {
    const pins = createPins()
    outputPin(pins, 5)
    pins.setValue(5, true)
    pins.setDirection(5, DIRECTION.INPUT)

    expect(pins.setValue(5, false)).toBe(PIN_ERR.WRONG_DIRECTION)
    expect(pins.getOutputValue(5)).toBe(1)
  })

  it('reads the pull-implied level on an undriven input', () => {
    const pins = createPins()
    pins.claim(1)
    expect(pins.getValue(1)).toBe(0)
    pins.setPull(1, PULL.UP)
    expect(pins.getValue(1)).toBe(1)
    pins.setPull(1, PULL.DOWN)
    expect(pins.getValue(1)).toBe(0)
  })

  it('prefers an injected input level over the pull', () => {
    const pins = createPins()
    pins.claim(1)
    pins.setPull(1, PULL.UP)
    pins.injectInput(1, false)
    expect(pins.getValue(1)).toBe(0)

    pins.clearInjectedInput(1)
    expect(pins.getValue(1)).toBe(1)
  })

  it('keeps input and output cells apart across direction changes', () => {
    const pins = createPins()
    outputPin(pins, 4)
    pins.setValue(4, true)
    pins.injectInput(4, false)

    // Still Output: the latch wins
    expect(pins.getValue(4)).toBe(1)

    pins.setDirection(4, DIRECTION.INPUT)
    expect(pins.getValue(4)).toBe(0)

    pins.setDirection(4, DIRECTION.OUTPUT)
    expect(pins.getValue(4)).toBe(1)
  })

  it('stores pull and drive mode', () => {
    const pins = createPins()
    pins.claim(0)
    pins.setPull(0, PULL.DOWN)
    pins.setDriveMode(0, DRIVE_MODE.OPEN_DRAIN)

    expect(pins.getPull(0)).toBe(PULL.DOWN)
    expect(pins.getDriveMode(0)).toBe(DRIVE_MODE.OPEN_DRAIN)
    expect(pins.getDirection(0)).toBe(DIRECTION.INPUT)
  })
})

describe('PinRegistry reset sweep', () => {
  it('skips never-reset pins', () => {
    const pins = createPins(4)
    outputPin(pins, 0)
    pins.setValue(0, true)
    outputPin(pins, 1)
    pins.setValue(1, true)
    pins.markNeverReset(1)

    expect(pins.resetAll()).toBe(3)
    expect(pins.state(0)).toEqual({
      value: false,
      direction: DIRECTION.INPUT,
      pull: PULL.NONE,
      driveMode: DRIVE_MODE.PUSH_PULL,
      enabled: false,
      neverReset: false,
      inputValue: false,
      inputInjected: false
    })
    expect(pins.getValue(1)).toBe(1)
    expect(pins.isNeverReset(1)).toBe(true)
  })

  it('keeps injected levels through a reset', () => {
    const pins = createPins(4)
    pins.injectInput(2, true)
    pins.resetAll()
    pins.claim(2)
    expect(pins.getValue(2)).toBe(1)
  })
})

describe('PinRegistry layout', () => {
  it('exposes records at base + index * size', () => {
    const buffer = createBridgeSAB({ pinCount: 8, slotCapacity: 2 })
    const pins = new PinRegistry(buffer)
    const layout = pins.layout()
    expect(layout).toEqual({ baseOffset: 192 + 2 * 544, elementSize: 8, count: 8 })

    outputPin(pins, 6)
    pins.setValue(6, true)
    const bytes = new Uint8Array(buffer)
    expect(bytes[layout.baseOffset + 6 * layout.elementSize + PIN.VALUE]).toBe(1)
    expect(bytes[layout.baseOffset + 6 * layout.elementSize + PIN.DIRECTION]).toBe(DIRECTION.OUTPUT)
  })
})

// =============================================================================
// Analog
// =============================================================================

describe('AnalogRegistry', () => {
  function createAnalog(): AnalogRegistry {
    return new AnalogRegistry(createBridgeSAB({ pinCount: 8, slotCapacity: 1 }))
  }

  it('reads mid-scale on an undriven input', () => {
    const analog = createAnalog()
    analog.init(0, false)
    expect(analog.read(0)).toBe(ANALOG_MID_SCALE)
  })

  it('reads the injected level', () => {
    const analog = createAnalog()
    analog.init(0, false)
    analog.injectInput(0, 1234)
    expect(analog.read(0)).toBe(1234)
  })

  it('clamps DAC writes to 16 bits', () => {
    const analog = createAnalog()
    analog.init(1, true)
    analog.write(1, 70000)
    expect(analog.getOutput(1)).toBe(65535)
    analog.write(1, -5)
    expect(analog.getOutput(1)).toBe(0)
  })

  it('rejects use in the wrong direction or while disabled', () => {
    const analog = createAnalog()
    analog.init(0, false)
    analog.init(1, true)

    expect(analog.write(0, 1)).toBe(PIN_ERR.WRONG_DIRECTION)
    expect(analog.read(1)).toBe(PIN_ERR.WRONG_DIRECTION)
    expect(analog.read(2)).toBe(PIN_ERR.DISABLED)
    expect(analog.init(0, true)).toBe(PIN_ERR.IN_USE)
  })

  it('resetAll() keeps the pins it is told to keep', () => {
    const analog = createAnalog()
    analog.init(0, true)
    analog.init(1, true)
    analog.resetAll((pin) => pin === 1)

    expect(analog.isClaimed(0)).toBe(false)
    expect(analog.isClaimed(1)).toBe(true)
  })
})
