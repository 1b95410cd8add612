import { describe, expect, it } from 'vitest';
import { ToolUnavailableError } from './errors.ts';
import { FFprobeProber, parseProbeOutput, probeBitrate, probeCodec } from './ffprobe.ts';
import { FFProbeOutputSchema } from './schemas.ts';
import { FakeProber } from './testing.ts';

function output(json: unknown) {
  return FFProbeOutputSchema.parse(json);
}

describe('parseProbeOutput', () => {
  it('prefers the video stream bitrate', () => {
    const info = parseProbeOutput(
      output({
        streams: [{ codec_name: 'H264', bit_rate: '4500000' }],
        format: { duration: '120.5', bit_rate: '4800000' },
      }),
      0,
    );

    expect(info).toEqual({ codec: 'h264', bitrateKbps: 4500, bitrateSource: 'stream', durationSeconds: 120.5 });
  });

  it('falls back to the container bitrate', () => {
    const info = parseProbeOutput(
      output({
        streams: [{ codec_name: 'mpeg4', bit_rate: 'N/A' }],
        format: { duration: '60', bit_rate: '2000000' },
      }),
      0,
    );

    expect(info?.bitrateKbps).toBe(2000);
    expect(info?.bitrateSource).toBe('container');
  });

  it('derives the bitrate from size and duration as a last resort', () => {
    // 15 MB over 60 s is 2000 kbps
    const info = parseProbeOutput(
      output({ streams: [{ codec_name: 'wmv3' }], format: { duration: '60', size: '15000000' } }),
      0,
    );

    expect(info?.bitrateKbps).toBe(2000);
    expect(info?.bitrateSource).toBe('file-size');
  });

  it('uses the known file size when the container omits it', () => {
    const info = parseProbeOutput(output({ streams: [{ codec_name: 'vc1' }], format: { duration: '100' } }), 25_000_000);

    expect(info?.bitrateKbps).toBe(2000);
  });

  it('takes the stream duration when the container has none', () => {
    const info = parseProbeOutput(output({ streams: [{ codec_name: 'h264', duration: '42.0' }] }), 0);

    expect(info).toEqual({ codec: 'h264', bitrateKbps: null, bitrateSource: null, durationSeconds: 42 });
  });

  it('returns null without a video stream', () => {
    expect(parseProbeOutput(output({ streams: [], format: { duration: '10' } }), 100)).toBeNull();
  });
});

describe('header helpers', () => {
  it('read the codec and bitrate through a prober', async () => {
    const prober = new FakeProber({ '/a.mp4': { codec: 'h264', bitrateKbps: 3100, bitrateSource: 'stream', durationSeconds: 10 } });

    expect(await probeCodec(prober, '/a.mp4')).toBe('h264');
    expect(await probeBitrate(prober, '/a.mp4')).toBe(3100);
  });

  it('return null for unreadable headers', async () => {
    const prober = new FakeProber();

    expect(await probeCodec(prober, '/broken.mp4')).toBeNull();
    expect(await probeBitrate(prober, '/broken.mp4')).toBeNull();
  });
});

describe('FFprobeProber', () => {
  it('reports a binary that cannot be started as a fatal tool error', async () => {
    const prober = new FFprobeProber('/nonexistent/cloud-shrink-ffprobe');

    await expect(prober.probe('/media/a.mp4')).rejects.toBeInstanceOf(ToolUnavailableError);
  });
});
