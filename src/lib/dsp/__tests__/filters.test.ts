import { describe, it, expect } from "vitest";
import { lowPass, highPass } from "../filters";
import { rms } from "../levelMeter";

function makeSine(freq: number, sampleRate: number, duration: number, amplitude = 10000): Int16Array {
  const len = Math.round(sampleRate * duration);
  const data = new Int16Array(len);
  for (let i = 0; i < len; i++) {
    data[i] = Math.round(amplitude * Math.sin((2 * Math.PI * freq * i) / sampleRate));
  }
  return data;
}

describe("FilterBank", () => {
  it("returns empty output for empty input", () => {
    expect(lowPass(new Int16Array(0), 500)).toHaveLength(0);
    expect(highPass(new Int16Array(0), 500)).toHaveLength(0);
  });

  it("low-pass attenuates a tone above the cutoff", () => {
    const sine = makeSine(1000, 44100, 0.1);
    const filtered = lowPass(sine, 500, 44100);
    expect(rms(filtered)).toBeLessThanOrEqual(rms(sine));
    expect(rms(filtered)).toBeLessThan(rms(sine) * 0.7);
  });

  it("low-pass keeps the first sample as is", () => {
    const out = lowPass(Int16Array.from([1234, 0, 0]), 500, 44100);
    expect(out[0]).toBe(1234);
  });

  it("high-pass follows y[n] = a·(y[n-1] + x[n] - x[n-1])", () => {
    const out = highPass(Int16Array.from([1000, 1000]), 100, 44100);
    expect(Array.from(out)).toEqual([1000, 985]);
  });

  it("high-pass decays DC to zero", () => {
    const out = highPass(new Int16Array(4410).fill(1000), 100, 44100);
    expect(out[out.length - 1]).toBe(0);
  });

  it("filters interleaved channels independently", () => {
    const stereo = new Int16Array(200);
    for (let i = 0; i < stereo.length; i += 2) stereo[i] = 1000;

    const out = highPass(stereo, 100, 44100, 2);
    expect(Array.from(out.slice(0, 4))).toEqual([1000, 0, 985, 0]);
    for (let i = 1; i < out.length; i += 2) expect(out[i]).toBe(0);
  });
});
