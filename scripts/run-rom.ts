#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { Chip8System } from '@core/system/system'
import { parseRom } from '@core/rom/rom'
import { runSystem } from '@core/harness/headless'
import type { FaultPolicy } from '@core/harness/headless'
import { writePng } from '@host/node/png'
import { getEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || ''
  let frames = parseInt(getEnv('FRAMES') || '600', 10)
  let cycles: number | undefined
  let decay: number | undefined
  let png = getEnv('PNG') || ''
  let scale = 8
  let onFault: FaultPolicy = 'halt'
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--frames=')) frames = parseInt(a.slice(9), 10)
    else if (a.startsWith('--cycles=')) cycles = parseInt(a.slice(9), 10)
    else if (a.startsWith('--decay=')) decay = parseFloat(a.slice(8))
    else if (a.startsWith('--png=')) png = a.slice(6)
    else if (a.startsWith('--scale=')) scale = Math.max(1, parseInt(a.slice(8), 10) || 1)
    else if (a === '--skip-faults') onFault = 'skip'
    else if (!a.startsWith('--') && !rom) rom = a
  }
  if (!Number.isFinite(frames) || frames < 0) frames = 0
  return { rom, frames, cycles, decay, png, scale, onFault }
}

async function main() {
  const args = parseArgs()
  if (!args.rom) { console.error('Usage: tsx scripts/run-rom.ts --rom=<file.ch8> [--frames=N] [--cycles=N] [--decay=D] [--png=out.png] [--scale=N] [--skip-faults]'); process.exit(2) }
  if (!fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom}`); process.exit(2) }
  const rom = parseRom(new Uint8Array(fs.readFileSync(args.rom)), path.basename(args.rom))
  const sys = new Chip8System({ cyclesPerFrame: args.cycles, decayFactor: args.decay })
  sys.loadRom(rom)
  const res = runSystem(sys, { frames: args.frames, onFault: args.onFault })
  if (args.png) await writePng(path.resolve(args.png), sys.framebuffer.intensities(), args.scale)
  console.log(JSON.stringify({
    rom: rom.name,
    frames: res.frames,
    cycles: res.cycles,
    reason: res.reason,
    faults: res.faults.map((f) => ({ kind: f.kind, message: f.message })),
    sound_frames: res.soundFrames,
    lit: sys.framebuffer.litCount(),
    crc: `0x${res.crc.toString(16).toUpperCase().padStart(8, '0')}`,
    png: args.png || undefined,
  }))
  process.exit(res.reason === 'fault' ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
