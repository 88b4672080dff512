#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8System } from '@core/system/system'
import { disasmRom } from '@utils/disasm'
import { traceSystem } from '@core/harness/trace'
import { getEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '200', 10)
  let listing = false
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--list') listing = true
  }
  if (!Number.isFinite(max) || max < 0) max = 0
  return { rom, max, listing }
}

async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none)'}`); process.exit(2) }
  const bytes = new Uint8Array(fs.readFileSync(args.rom))

  if (args.listing) {
    for (const line of disasmRom(bytes)) console.log(line)
    return
  }

  const sys = new Chip8System()
  sys.loadRom(bytes)
  for (const line of traceSystem(sys, args.max)) console.log(line)
}

main().catch((e) => { console.error(e); process.exit(1) })
