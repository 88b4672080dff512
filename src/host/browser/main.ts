import { Chip8System, FRAME_MS } from '@core/system/system'
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/framebuffer'
import { renderRgba } from '@host/palette'
import { keyForCode } from './keymap'
import { toggleFullscreen } from './fullscreen'

// Query flags (read once; UI controls take precedence)
const query = new URL(window.location.href).searchParams
const numParam = (name: string): number | undefined => {
  const v = Number(query.get(name))
  return query.has(name) && Number.isFinite(v) ? v : undefined
}

const $ = <T extends HTMLElement>(sel: string, ctor: { new (): T }): T => {
  const el = document.querySelector(sel)
  if (!(el instanceof ctor)) throw new Error(`Missing element ${sel}`)
  return el
}

const canvas = $('#screen', HTMLCanvasElement)
const statusEl = $('#status', HTMLSpanElement)
const startBtn = $('#start', HTMLButtonElement)
const pauseBtn = $('#pause', HTMLButtonElement)
const stepBtn = $('#step', HTMLButtonElement)
const fullscreenBtn = $('#fullscreen', HTMLButtonElement)
const romInput = $('#rom', HTMLInputElement)
const speedSlider = $('#speed', HTMLInputElement)
const speedLabel = $('#speedLabel', HTMLSpanElement)
const decaySlider = $('#decay', HTMLInputElement)
const decayLabel = $('#decayLabel', HTMLSpanElement)

canvas.width = SCREEN_WIDTH
canvas.height = SCREEN_HEIGHT
const ctx = canvas.getContext('2d', { alpha: false })
if (!ctx) throw new Error('2D canvas unavailable')
const image = ctx.createImageData(SCREEN_WIDTH, SCREEN_HEIGHT)

const sys = new Chip8System({ cyclesPerFrame: numParam('cycles'), decayFactor: numParam('decay') })
let romBytes: Uint8Array | null = null
let running = false
let lastTs = 0

// Square-wave beeper gated by the sound timer
let audioCtx: AudioContext | null = null
let beepGain: GainNode | null = null
const ensureAudio = (): void => {
  if (audioCtx) return
  audioCtx = new AudioContext()
  const osc = audioCtx.createOscillator()
  osc.type = 'square'
  osc.frequency.value = 440
  beepGain = audioCtx.createGain()
  beepGain.gain.value = 0
  osc.connect(beepGain).connect(audioCtx.destination)
  osc.start()
}
const setBeep = (on: boolean): void => {
  if (beepGain) beepGain.gain.value = on ? 0.08 : 0
}

const syncLabels = (): void => {
  const cfg = sys.config
  speedSlider.value = String(cfg.cyclesPerFrame)
  speedLabel.textContent = `${cfg.cyclesPerFrame} cyc/frame`
  decaySlider.value = String(cfg.decayFactor)
  decayLabel.textContent = cfg.decayFactor.toFixed(2)
}

const draw = (): void => {
  renderRgba(sys.framebuffer.intensities(), image.data, 1)
  ctx.putImageData(image, 0, 0)
}

const frameLoop = (ts: number): void => {
  if (!running) return
  // Cap the catch-up after a background tab so timers do not race
  const elapsed = lastTs === 0 ? FRAME_MS : Math.min(ts - lastTs, 100)
  lastTs = ts
  const res = sys.runFrame(elapsed)
  if (res.fault) {
    statusEl.textContent = `Halted: ${res.fault.message}`
    console.error('[main]', res.fault)
  }
  setBeep(sys.soundActive && !sys.paused)
  draw()
  requestAnimationFrame(frameLoop)
}

window.addEventListener('keydown', (ev: KeyboardEvent): void => {
  const k = keyForCode(ev.code)
  if (k === null) return
  sys.keypad.setKey(k, true)
  ev.preventDefault()
})

window.addEventListener('keyup', (ev: KeyboardEvent): void => {
  const k = keyForCode(ev.code)
  if (k === null) return
  sys.keypad.setKey(k, false)
  ev.preventDefault()
})

romInput.addEventListener('change', async (): Promise<void> => {
  const file = romInput.files?.[0]
  if (!file) return
  try {
    romBytes = new Uint8Array(await file.arrayBuffer())
    sys.loadRom(romBytes)
    draw()
    statusEl.textContent = `Loaded ${file.name} (${romBytes.length} bytes), press Start`
  } catch (e) {
    romBytes = null
    statusEl.textContent = e instanceof Error ? e.message : 'Failed to load ROM'
    console.error(e)
  }
})

startBtn.addEventListener('click', (): void => {
  if (!romBytes) return
  ensureAudio()
  void audioCtx?.resume()
  sys.loadRom(romBytes)
  sys.resume()
  statusEl.textContent = 'Running'
  if (!running) {
    running = true
    lastTs = 0
    requestAnimationFrame(frameLoop)
  }
})

pauseBtn.addEventListener('click', (): void => {
  if (sys.paused) {
    sys.resume()
    statusEl.textContent = 'Running'
  } else {
    sys.pause()
    setBeep(false)
    statusEl.textContent = 'Paused'
  }
})

stepBtn.addEventListener('click', (): void => {
  if (!romBytes) return
  sys.pause()
  const fault = sys.stepInstruction()
  statusEl.textContent = fault ? `Halted: ${fault.message}` : `Stepped to $${sys.cpu.state.pc.toString(16).padStart(3, '0')}`
  sys.framebuffer.advanceFrame()
  draw()
})

fullscreenBtn.addEventListener('click', (): void => {
  toggleFullscreen(canvas, document).catch((e: unknown) => {
    statusEl.textContent = e instanceof Error ? e.message : 'Fullscreen unavailable'
    console.error(e)
  })
})

speedSlider.addEventListener('input', (): void => {
  sys.setCyclesPerFrame(Math.max(1, parseInt(speedSlider.value, 10) || 1))
  syncLabels()
})

decaySlider.addEventListener('input', (): void => {
  sys.setDecayFactor(parseFloat(decaySlider.value))
  syncLabels()
})

syncLabels()
draw()
