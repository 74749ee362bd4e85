import { MissingCapabilityError, TypeMismatchError } from "../../errors"
import { Point, Tag } from "../../../tests/utils/dict-test-helpers"
import { instanceMatcher, methodDecoder, methodEncoder } from "../method-codec"

describe("instanceMatcher", () => {
  it("matches direct instances only", () => {
    class Sub extends Point {}
    const matches = instanceMatcher(Point)

    expect(matches(new Point(1, 2))).toBe(true)
    expect(matches(new Sub(1, 2))).toBe(false)
    expect(matches({ x: 1, y: 2 })).toBe(false)
  })
})

describe("methodEncoder", () => {
  it("calls the named instance method", () => {
    expect(methodEncoder(Point, "encode")(new Point(5, 6))).toBe("5,6")
  })

  it("fails at creation when the prototype lacks the method", () => {
    expect(() => methodEncoder(Point, "toPayload")).toThrow(MissingCapabilityError)
  })

  it("rejects non-string results", () => {
    class Weird {
      encode(): number {
        return 1
      }
    }

    expect(() => methodEncoder(Weird, "encode")(new Weird())).toThrow(
      "Weird.prototype.encode() must return a string",
    )
  })
})

describe("methodDecoder", () => {
  it("calls the named static method", () => {
    expect(methodDecoder(Point, "decode")("7,8")).toStrictEqual(new Point(7, 8))
  })

  it("fails at creation when the class lacks the static method", () => {
    let caught: unknown

    try {
      methodDecoder(Tag, "decode")
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(MissingCapabilityError)
    expect(caught).toMatchObject({
      code: "missing_capability",
      context: { typeName: "Tag", member: "decode", kind: "static" },
    })
  })

  it("rejects results that are not instances of the class", () => {
    class Liar {
      static decode(): unknown {
        return { not: "a liar" }
      }
    }

    expect(() => methodDecoder(Liar, "decode")("x")).toThrow(TypeMismatchError)
  })
})
