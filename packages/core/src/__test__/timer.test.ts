import {describe, expect, test} from "vitest";
import {Timer} from "../timer.js";

function fakeClock(...readings: number[]): () => number {
  let i = 0
  return () => readings[i++] ?? 0
}

describe("Timer", () => {
  test("accumulates samples and reports mean and range", () => {
    const lines: string[] = []
    const timer = new Timer({ clock: fakeClock(0, 250, 1000, 1500), sink: (line) => lines.push(line) })

    timer.start("load").stop()
    timer.start("load").stop("load")

    expect(timer.total("load")).toBe(0.75)
    expect(timer.reportOne("load")).toBe("load : 0.750s ≈ 2 x 0.375s - (0.250-0.500)")
    expect(lines).toEqual(["load : 0.750s ≈ 2 x 0.375s - (0.250-0.500)"])
  })

  test("stop with report writes one line to the sink", () => {
    const lines: string[] = []
    const timer = new Timer({ clock: fakeClock(0, 125), sink: (line) => lines.push(line) })
    timer.start("parse")
    timer.stop("parse", { report: true })
    expect(lines).toEqual(["parse : 0.125s"])
  })

  test("report pads names to a common width", () => {
    const timer = new Timer({ clock: fakeClock(0, 1000, 0, 2000), sink: () => {} })
    timer.start("a").stop()
    timer.start("longer").stop()
    expect(timer.names).toEqual(["a", "longer"])
    expect(timer.report(1)).toEqual(["a      : 1.0s", "longer : 2.0s"])
  })

  test("stopping an idle timer records nothing", () => {
    const timer = new Timer({ clock: fakeClock(), sink: () => {} })
    timer.stop("never")
    timer.stop()
    expect(timer.total("never")).toBe(0)
    expect(timer.names).toEqual([])
  })
})
