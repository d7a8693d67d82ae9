#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Chip8System } from '@core/system/system'
import { isMachineFault } from '@core/system/errors'
import { TIMER_INTERVAL_MS } from '@core/timer/timers'
import { HostDriver } from '@host/driver'
import { AsciiSink } from '@host/node/ascii'
import { writePng } from '@host/node/png'
import { parseConfig } from '@host/node/config'
import { ScriptedKeys } from '@host/node/keys'
import { listRoms, readRom, romMenu, selectRom } from '@host/node/roms'
import { crc32Hex } from '@utils/crc32'
import { lfsrRandom } from '@utils/lfsr'
import { disasmAt, formatLine } from '@utils/disasm'

async function main(): Promise<void> {
  const cfg = parseConfig(process.argv.slice(2))
  const romPath = selectRom(cfg.romDir, cfg.rom)
  if (!romPath) {
    console.error(`ROM not found. Pass --rom=<file> or put .ch8 files in ${cfg.romDir}/`)
    const available = listRoms(cfg.romDir)
    if (available.length > 0) console.error(`Available: ${available.join(', ')}`)
    process.exit(2)
  }

  if (!cfg.rom) {
    console.log(`ROMs in ${cfg.romDir}/:`)
    for (const line of romMenu(listRoms(cfg.romDir), romPath)) console.log(line)
    console.log('Pass --rom=<name> to pick another')
  }

  const sys = new Chip8System(readRom(romPath), { random: cfg.seed === null ? undefined : lfsrRandom(cfg.seed) })
  const video = new AsciiSink()
  const driver = new HostDriver(sys, {
    video,
    audio: { setTone: (on) => console.log(`[tone] ${on ? 'on' : 'off'} at frame ${driver.scheduler.frames}`) },
    input: new ScriptedKeys(cfg.keys, cfg.presses),
  }, { stepsPerFrame: cfg.stepsPerFrame })

  console.log(`Running ${romPath} for ${cfg.frames} frames at ${cfg.stepsPerFrame} steps/frame`)
  let code = 0
  try {
    for (let f = 0; f < cfg.frames; f++) driver.frame(TIMER_INTERVAL_MS)
  } catch (e) {
    if (!isMachineFault(e)) throw e
    console.error(e.message)
    console.error(formatLine(disasmAt((a) => sys.bus.read(a), e.pc)))
    console.error(sys.describe())
    code = 1
  }

  if (code === 0 && sys.awaitingKey) console.log('Program is waiting for a key; tap one with --press=<frame>:<key>')
  const frame = sys.frame()
  for (const line of video.last) console.log(line)
  console.log(`frames=${driver.scheduler.frames} steps=${sys.cpu.state.steps} crc=${crc32Hex(frame.pixels)}`)
  if (cfg.png) {
    await writePng(cfg.png, frame, { scale: cfg.scale })
    console.log('PNG written:', cfg.png)
  }
  process.exit(code)
}

main().catch((e) => { console.error(e); process.exit(1) })
