import {describe, expect, test} from "vitest";
import {Fmt} from "../fmt.js";
import {Printer, PrintFormatter} from "../printable.js";

interface Point { x: number; y: number }

const PointPrinter = Printer.define<Point>((p, fmt) => `${fmt.bold("point")} ${p.x},${p.y}`)

describe("Printer", () => {
  test("prints plain without colour", () => {
    const formatter = new PrintFormatter(Fmt.noop)
    expect(formatter.print(PointPrinter, { x: 1, y: 2 })).toBe("point 1,2")
  })

  test("ansi styling wraps the text", () => {
    const formatter = new PrintFormatter(Fmt.ansi)
    expect(formatter.print(PointPrinter, { x: 0, y: 0 })).toBe(`${Fmt.ansi.bold("point")} 0,0`)
    expect(Fmt.ansi.bold("point")).not.toBe("point")
  })

  test("printList joins with the separator", () => {
    const formatter = new PrintFormatter(Fmt.noop)
    const points = [{ x: 1, y: 1 }, { x: 2, y: 2 }]
    expect(formatter.printList(PointPrinter, points)).toBe("point 1,1\npoint 2,2")
    expect(formatter.printList(PointPrinter, points, "; ")).toBe("point 1,1; point 2,2")
    expect(Printer.lines(["a", "b"])).toBe("a\nb")
  })
})
