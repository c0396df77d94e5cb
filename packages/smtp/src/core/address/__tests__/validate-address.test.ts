import { InvalidEmailError } from "../../errors/errors"
import { findInvalidEmails, isValidEmail, validateAddress } from "../validate-address"

describe("isValidEmail", () => {
  it.each([
    "a@b.com",
    "a.b+c@sub.example.co",
    "o'brien@example.ie",
    "user@[192.0.2.1]",
    "user@[IPv6:2001:db8::1]",
    "first_last-1@mail-relay.example.org",
  ])("accepts %s", (address) => {
    expect(isValidEmail(address)).toBe(true)
  })

  it.each([
    "",
    "a@",
    "@b.com",
    "a b@c.com",
    "a..b@example.com",
    ".a@example.com",
    "a.@example.com",
    "a@example",
    "a@example.c",
    "a@-example.com",
    "a@example..com",
    "a@[300.1.1.1]",
    "a@[IPv6:not-an-address]",
    "a@[192.0.2.1",
  ])("rejects %j", (address) => {
    expect(isValidEmail(address)).toBe(false)
  })

  it("rejects a local part longer than 64 characters", () => {
    expect(isValidEmail(`${"a".repeat(64)}@example.com`)).toBe(true)
    expect(isValidEmail(`${"a".repeat(65)}@example.com`)).toBe(false)
  })

  it("rejects addresses longer than 254 characters", () => {
    const domain = `${"d".repeat(60)}.${"e".repeat(60)}.${"f".repeat(60)}.${"g".repeat(50)}.com`
    const local = "a".repeat(254 - domain.length)

    expect(isValidEmail(`${local}@${domain}`)).toBe(false)
    expect(isValidEmail(`${local.slice(1)}@${domain}`)).toBe(true)
  })

  it("ignores surrounding whitespace", () => {
    expect(isValidEmail("  a@b.com\t")).toBe(true)
  })
})

describe("validateAddress", () => {
  it("returns the trimmed address", () => {
    expect(validateAddress(" a@b.com ")).toBe("a@b.com")
  })

  it("throws InvalidEmailError carrying the address", () => {
    try {
      validateAddress("not-an-address")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidEmailError)
      expect(err).toMatchObject({
        code: "invalid_email",
        invalidEmails: ["not-an-address"],
        context: { invalidEmails: ["not-an-address"] },
      })
    }
  })
})

describe("findInvalidEmails", () => {
  it("returns only the invalid entries, in order", () => {
    expect(findInvalidEmails(["ok@example.com", "bad", "fine@example.org", "a@"])).toEqual([
      "bad",
      "a@",
    ])
  })

  it("returns an empty list when everything is valid", () => {
    expect(findInvalidEmails(["a@b.com"])).toEqual([])
  })
})
