import { describe, expect, it } from 'vitest'
import { PassThrough } from 'stream'
import {
  FfmpegLogParser,
  decodeLine,
  parseLogLevel,
  parseTimeString,
  stripLevelPrefix,
  tryParseConfiguration,
  tryParseDuration,
  tryParseInput,
  tryParseOutput,
  tryParseProgress,
  tryParseStream,
  tryParseVersion,
} from '../src/Core/LogParser.js'
import { LogParseError } from '../src/Core/Errors.js'
import type { FfmpegEvent } from '../src/Types/index.js'

const PREAMBLE = [
  '[info] ffmpeg version 7.1 Copyright (c) 2000-2024 the FFmpeg developers',
  '[info]   configuration: --enable-gpl --enable-libx264',
  "[info] Input #0, lavfi, from 'testsrc=duration=2':",
  '[info]   Duration: N/A, start: 0.000000, bitrate: N/A',
  '[info]   Stream #0:0: Video: wrapped_avframe, rgb24, 320x240 [SAR 1:1 DAR 4:3], 25 fps, 25 tbr, 25 tbn',
  '[info] Stream mapping:',
  '[info]   Stream #0:0 -> #0:0 (wrapped_avframe (native) -> rawvideo (native))',
  '[info] Press [q] to stop, [?] for help',
  "[info] Output #0, rawvideo, to 'pipe:':",
  '[info]   Stream #0:0: Video: rawvideo (RGB[24] / 0x18424752), rgb24(progressive), 320x240 [SAR 1:1 DAR 4:3], q=2-31, 46080 kb/s, 25 fps, 25 tbn',
  '[info] frame=   50 fps=0.0 q=-0.0 Lsize=   11250KiB time=00:00:02.00 bitrate=46080.0kbits/s speed=  10x',
]

async function parseAll(parser: FfmpegLogParser): Promise<FfmpegEvent[]> {
  const events: FfmpegEvent[] = []
  for (;;) {
    const event = await parser.parseNextEvent()
    events.push(event)
    if (event.type === 'logEOF') return events
  }
}

function parserFor(text: string | Buffer): FfmpegLogParser {
  const stream = new PassThrough()
  stream.end(text)
  return new FfmpegLogParser(stream)
}

function idleParser(): FfmpegLogParser {
  return new FfmpegLogParser(new PassThrough())
}

describe('line helpers', () => {
  it('strips a leading level tag only', () => {
    expect(stripLevelPrefix('[info] Stream mapping:')).toBe('Stream mapping:')
    expect(stripLevelPrefix('[info]   Stream #0:0')).toBe('  Stream #0:0')
    expect(stripLevelPrefix('no tag [info]')).toBe('no tag [info]')
  })

  it('classifies log levels by embedded marker', () => {
    expect(parseLogLevel('[info] hello')).toBe('info')
    expect(parseLogLevel('[warning] careful')).toBe('warning')
    expect(parseLogLevel('[mp4 @ 0x5581] [error] broken')).toBe('error')
    expect(parseLogLevel('[fatal] gone')).toBe('fatal')
    expect(parseLogLevel('plain text')).toBe('unknown')
  })

  it('parses time strings as seconds', () => {
    expect(parseTimeString('00:00:05.00')).toBe(5)
    expect(parseTimeString('01:02:03.5')).toBe(3723.5)
    expect(parseTimeString('02:30')).toBe(150)
    expect(parseTimeString('12.5')).toBe(12.5)
    expect(parseTimeString('N/A')).toBeUndefined()
    expect(parseTimeString('1:2:3:4')).toBeUndefined()
  })

  it('rejects invalid UTF-8', () => {
    expect(() => decodeLine(Uint8Array.from([0x66, 0xff]))).toThrow(LogParseError)
    expect(decodeLine(Buffer.from('größe', 'utf8'))).toBe('größe')
  })
})

describe('tryParse helpers', () => {
  it('parses the version token', () => {
    expect(tryParseVersion('[info] ffmpeg version 7.1-full_build-www.gyan.dev Copyright (c) 2000-2024')).toBe(
      '7.1-full_build-www.gyan.dev'
    )
    expect(tryParseVersion('ffmpeg version N-118000-g1234abcd Copyright')).toBe('N-118000-g1234abcd')
    expect(tryParseVersion('[info] something else')).toBeUndefined()
  })

  it('parses configuration flags', () => {
    expect(tryParseConfiguration('[info]   configuration: --enable-gpl   --enable-nonfree')).toEqual([
      '--enable-gpl',
      '--enable-nonfree',
    ])
    expect(tryParseConfiguration('[info]   libavutil      59. 39.100')).toBeUndefined()
  })

  it('parses input and output declarations', () => {
    expect(tryParseInput("[info] Input #0, lavfi, from 'testsrc=duration=5':")).toBe(0)
    expect(tryParseInput("[info] Input #12, mov,mp4,m4a, from 'in.mp4':")).toBe(12)
    expect(tryParseInput('[info] Inputs are ready')).toBeUndefined()

    const line = "[info] Output #1, mp4, to 'out dir/test.mp4':"
    expect(tryParseOutput(line)).toEqual({ index: 1, to: 'out dir/test.mp4', rawLogMessage: line })
    expect(tryParseOutput("[info] Output #0, rawvideo, to 'pipe:':")?.to).toBe('pipe:')
    expect(tryParseOutput('[info] Output file is empty')).toBeUndefined()
  })

  it('parses durations', () => {
    expect(tryParseDuration('[info]   Duration: 00:00:05.00, start: 0.000000, bitrate: 16 kb/s')).toBe(5)
    expect(tryParseDuration('[info]   Duration: 01:00:00.50, start: 0.0')).toBe(3600.5)
    expect(tryParseDuration('[info]   Duration: N/A, start: 0.000000, bitrate: N/A')).toBeUndefined()
  })

  it('parses the documented video stream descriptor', () => {
    const line = '[info]   Stream #0:0: Video: wrapped_avframe, rgb24, 320x240 [SAR 1:1 DAR 4:3], 25 fps, 25 tbr, 25 tbn'
    expect(tryParseStream(line)).toEqual({
      format: 'wrapped_avframe',
      language: '',
      parentIndex: 0,
      streamIndex: 0,
      typeSpecificData: { type: 'video', pixFmt: 'rgb24', width: 320, height: 240, fps: 25 },
      rawLogMessage: line,
    })
  })

  it('handles parenthesised pixel formats, languages and skipped fields', () => {
    const stream = tryParseStream(
      '[info]   Stream #1:5(eng): Video: h264 (avc1 / 0x31637661), yuv444p(tv, progressive), 320x240 [SAR 1:1 DAR 4:3], q=2-31, 25 fps, 12800 tbn'
    )
    expect(stream?.parentIndex).toBe(1)
    expect(stream?.streamIndex).toBe(5)
    expect(stream?.language).toBe('eng')
    expect(stream?.format).toBe('h264')
    expect(stream?.typeSpecificData).toEqual({ type: 'video', pixFmt: 'yuv444p', width: 320, height: 240, fps: 25 })
  })

  it('reads fractional frame rates and defaults a missing one to 0', () => {
    const ntsc = tryParseStream('[info]   Stream #0:0: Video: h264 (High), yuv420p, 1920x1080, 29.97 fps, 29.97 tbr')
    expect(ntsc?.typeSpecificData).toEqual({ type: 'video', pixFmt: 'yuv420p', width: 1920, height: 1080, fps: 29.97 })
    const still = tryParseStream('[info]   Stream #0:0: Video: png, rgba, 64x64')
    expect(still?.typeSpecificData).toEqual({ type: 'video', pixFmt: 'rgba', width: 64, height: 64, fps: 0 })
  })

  it('parses audio streams', () => {
    const stream = tryParseStream(
      '[info]   Stream #0:1(und): Audio: aac (LC) (mp4a / 0x6134706D), 48000 Hz, stereo, fltp, 128 kb/s (default)'
    )
    expect(stream?.format).toBe('aac')
    expect(stream?.language).toBe('und')
    expect(stream?.typeSpecificData).toEqual({ type: 'audio', sampleRate: 48000, channels: 'stereo' })
  })

  it('strips bracketed substream ids', () => {
    const stream = tryParseStream('[info]   Stream #0:2[0x3](eng): Data: bin_data (text / 0x74786574)')
    expect(stream?.streamIndex).toBe(2)
    expect(stream?.language).toBe('eng')
    expect(stream?.format).toBe('bin_data')
    expect(stream?.typeSpecificData).toEqual({ type: 'other' })
  })

  it('parses subtitle streams', () => {
    const stream = tryParseStream('[info]   Stream #0:3: Subtitle: mov_text (tx3g / 0x67337874)')
    expect(stream?.format).toBe('mov_text')
    expect(stream?.typeSpecificData).toEqual({ type: 'subtitle' })
  })

  it('rejects malformed stream descriptors', () => {
    expect(tryParseStream('[info]   Stream #x:0: Video: h264')).toBeUndefined()
    expect(tryParseStream('[info]   Stream #0:0: Video: h264, yuv420p, widexhigh')).toBeUndefined()
    expect(tryParseStream('[info]   Stream #0:0: Audio: pcm_s16le, stereo')).toBeUndefined()
  })

  it('parses the documented progress line', () => {
    const line = '[info] frame= 1996 fps=1984 q=-1.0 Lsize=     372kB time=00:01:19.72 bitrate=  38.2kbits/s speed=79.2x'
    expect(tryParseProgress(line)).toEqual({
      frame: 1996,
      fps: 1984,
      q: -1,
      sizeKb: 372,
      time: '00:01:19.72',
      bitrateKbps: 38.2,
      speed: 79.2,
      rawLogMessage: line,
    })
  })

  it('parses KiB sizes and padded speeds', () => {
    const progress = tryParseProgress(
      '[info] frame=  250 fps=0.0 q=-0.0 size=   56250KiB time=00:00:10.00 bitrate=46080.0kbits/s speed=  46x elapsed=0:00:00.21'
    )
    expect(progress?.frame).toBe(250)
    expect(progress?.sizeKb).toBe(56250)
    expect(progress?.bitrateKbps).toBe(46080)
    expect(progress?.speed).toBe(46)
  })

  it('treats N/A progress values as zero', () => {
    const progress = tryParseProgress('[info] frame=    0 fps=0.0 q=0.0 size=N/A time=N/A bitrate=N/A speed=N/A')
    expect(progress).toMatchObject({ frame: 0, fps: 0, q: 0, sizeKb: 0, time: 'N/A', bitrateKbps: 0, speed: 0 })
  })

  it('requires every progress field', () => {
    expect(tryParseProgress('[info] frame= 10 fps=25 q=1.0 time=00:00:01.00 bitrate=1kbits/s speed=1x')).toBeUndefined()
    expect(tryParseProgress('[info] frame=abc fps=25 q=1.0 size=1kB time=0 bitrate=1kbits/s speed=1x')).toBeUndefined()
  })
})

describe('FfmpegLogParser', () => {
  it('turns a preamble into typed events', async () => {
    const events = await parseAll(parserFor(PREAMBLE.join('\n') + '\n'))
    expect(events.map((e) => e.type)).toEqual([
      'parsedVersion',
      'parsedConfiguration',
      'parsedInput',
      'log',
      'parsedInputStream',
      'log',
      'parsedStreamMapping',
      'log',
      'parsedOutput',
      'parsedOutputStream',
      'progress',
      'logEOF',
    ])

    const [version, configuration, input] = events
    expect(version).toEqual({ type: 'parsedVersion', version: { version: '7.1', rawLogMessage: PREAMBLE[0] } })
    expect(configuration).toEqual({
      type: 'parsedConfiguration',
      configuration: { configuration: ['--enable-gpl', '--enable-libx264'], rawLogMessage: PREAMBLE[1] },
    })
    expect(input).toEqual({ type: 'parsedInput', input: { index: 0, rawLogMessage: PREAMBLE[2] } })
    expect(events[3]).toEqual({ type: 'log', level: 'info', message: PREAMBLE[3] })
    expect(events[8]).toEqual({
      type: 'parsedOutput',
      output: { index: 0, to: 'pipe:', rawLogMessage: PREAMBLE[8] },
    })
    const outputStream = events[9]
    expect(outputStream.type === 'parsedOutputStream' && outputStream.stream.format).toBe('rawvideo')
    const progress = events[10]
    expect(progress.type === 'progress' && progress.progress.sizeKb).toBe(11250)
  })

  it('keeps each line exactly as written, whatever the line ending', async () => {
    const events = await parseAll(parserFor(PREAMBLE.slice(0, 3).join('\r\n') + '\r\n'))
    expect(events.slice(0, 3).map((e) => (e.type === 'parsedInput' ? e.input.rawLogMessage : ''))).toEqual([
      '',
      '',
      PREAMBLE[2],
    ])
    expect(events[0]).toEqual({ type: 'parsedVersion', version: { version: '7.1', rawLogMessage: PREAMBLE[0] } })
  })

  it('attributes durations to the current input only', () => {
    const parser = idleParser()
    const inside = '[info]   Duration: 00:00:05.00, start: 0.000000, bitrate: 16 kb/s'
    expect(parser.parseLine(inside)).toEqual({ type: 'log', level: 'info', message: inside })
    parser.parseLine("[info] Input #3, lavfi, from 'anullsrc':")
    expect(parser.parseLine(inside)).toEqual({
      type: 'parsedDuration',
      duration: { inputIndex: 3, duration: 5, rawLogMessage: inside },
    })
  })

  it('tracks the section across lines', () => {
    const parser = idleParser()
    expect(parser.currentSection).toEqual({ kind: 'other' })
    parser.parseLine("[info] Input #0, lavfi, from 'testsrc':")
    expect(parser.currentSection).toEqual({ kind: 'input', index: 0 })
    parser.parseLine('[info] Stream mapping:')
    expect(parser.currentSection).toEqual({ kind: 'streamMapping' })
    parser.parseLine("[info] Output #2, null, to 'pipe:':")
    expect(parser.currentSection).toEqual({ kind: 'output', index: 2 })
    parser.parseLine('[info] frame=    1 fps=0.0 q=0.0 size=0kB time=00:00:00.04 bitrate=0.0kbits/s speed=1x')
    expect(parser.currentSection).toEqual({ kind: 'other' })
  })

  it('rejects stream descriptors outside an input or output', () => {
    const parser = idleParser()
    const line = '[info]   Stream #0:0: Video: rawvideo, rgb24, 320x240, 25 fps'
    expect(() => parser.parseLine(line)).toThrow(`Unexpected stream specification: ${line}`)
  })

  it('falls back to leveled log lines', () => {
    const parser = idleParser()
    expect(parser.parseLine('[warning] deprecated pixel format used')).toEqual({
      type: 'log',
      level: 'warning',
      message: '[warning] deprecated pixel format used',
    })
    expect(parser.parseLine('untagged')).toEqual({ type: 'log', level: 'unknown', message: 'untagged' })
  })

  it('yields logEOF once and then rejects', async () => {
    const parser = parserFor('')
    await expect(parser.parseNextEvent()).resolves.toEqual({ type: 'logEOF' })
    await expect(parser.parseNextEvent()).rejects.toBeInstanceOf(LogParseError)
  })

  it('treats a trailing run of delimiters as end of input', async () => {
    const events = await parseAll(parserFor('[info] only line\r\n\r\n\n'))
    expect(events).toEqual([{ type: 'log', level: 'info', message: '[info] only line' }, { type: 'logEOF' }])
  })

  it('fails on invalid UTF-8', async () => {
    const parser = parserFor(Buffer.from([0x5b, 0x69, 0xff, 0x0a]))
    await expect(parser.parseNextEvent()).rejects.toBeInstanceOf(LogParseError)
  })
})
