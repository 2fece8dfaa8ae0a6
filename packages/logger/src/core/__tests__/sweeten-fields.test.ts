import { sweetenFields } from "../sweeten-fields"

describe("sweetenFields", () => {
  it("pairs keys with the values that follow them", () => {
    expect(sweetenFields(["a", 1, "b", true])).toEqual({ fields: { a: 1, b: true }, invalid: [] })
  })

  it("returns nothing for no arguments", () => {
    expect(sweetenFields([])).toEqual({ fields: {}, invalid: [] })
  })

  it("sets aside a trailing key", () => {
    const result = sweetenFields(["a", 1, "b"])

    expect(result.fields).toEqual({ a: 1 })
    expect(result.dangling).toBe("b")
  })

  it("reports a trailing key even when it is undefined", () => {
    expect("dangling" in sweetenFields([undefined])).toBe(true)
  })

  it("collects pairs with non-string keys", () => {
    const key = { nested: true }

    expect(sweetenFields([1, "one", "a", 2, key, "x"])).toEqual({
      fields: { a: 2 },
      invalid: [
        [1, "one"],
        [key, "x"],
      ],
    })
  })

  it("lets a later value win for a repeated key", () => {
    expect(sweetenFields(["a", 1, "a", 2]).fields).toEqual({ a: 2 })
  })
})
