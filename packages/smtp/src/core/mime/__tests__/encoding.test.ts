import {
  dotStuff,
  encodeHeaderText,
  encodeQuotedPrintable,
  encodeWords,
  fitsSevenBit,
  formatParameter,
  isBase64,
  quoteString,
  toCrlf,
  wrapBase64,
} from "../encoding"

describe("toCrlf", () => {
  it("normalizes LF, CR and CRLF", () => {
    expect(toCrlf("a\nb\rc\r\nd")).toBe("a\r\nb\r\nc\r\nd")
  })
})

describe("fitsSevenBit", () => {
  it("accepts short ASCII lines", () => {
    expect(fitsSevenBit("hello\nworld")).toBe(true)
    expect(fitsSevenBit("a".repeat(998))).toBe(true)
  })

  it("rejects non-ASCII text and lines over 998 octets", () => {
    expect(fitsSevenBit("héllo")).toBe(false)
    expect(fitsSevenBit("a".repeat(999))).toBe(false)
  })
})

describe("encodeQuotedPrintable", () => {
  it("escapes UTF-8 bytes and equals signs", () => {
    expect(encodeQuotedPrintable("café x=y")).toBe("caf=C3=A9 x=3Dy")
  })

  it("escapes trailing whitespace only", () => {
    expect(encodeQuotedPrintable("a b \nc\t")).toBe("a b=20\r\nc=09")
  })

  it("adds soft line breaks to keep lines within 76 characters", () => {
    expect(encodeQuotedPrintable("a".repeat(80))).toBe(`${"a".repeat(75)}=\r\n${"a".repeat(5)}`)
  })

  it("never splits an escape sequence", () => {
    const encoded = encodeQuotedPrintable(`${"a".repeat(73)}é`)

    expect(encoded).toBe(`${"a".repeat(73)}=\r\n=C3=A9`)
  })
})

describe("wrapBase64", () => {
  it("wraps at 76 characters", () => {
    expect(wrapBase64("A".repeat(100))).toBe(`${"A".repeat(76)}\r\n${"A".repeat(24)}`)
  })

  it("drops existing whitespace first", () => {
    expect(wrapBase64("aGVs\nbG8=")).toBe("aGVsbG8=")
  })
})

describe("isBase64", () => {
  it.each(["aGVsbG8=", "aGVs\nbG8=", ""])("accepts %j", (value) => {
    expect(isBase64(value)).toBe(true)
  })

  it.each(["abc", "ab$=", "a==="])("rejects %j", (value) => {
    expect(isBase64(value)).toBe(false)
  })
})

describe("encodeWords", () => {
  it("Q-encodes non-ASCII characters and spaces", () => {
    expect(encodeWords("Grüße aus Köln")).toBe("=?UTF-8?Q?Gr=C3=BC=C3=9Fe_aus_K=C3=B6ln?=")
  })

  it("folds into encoded words of at most 75 characters", () => {
    const encoded = encodeWords("é".repeat(20))
    const word = `=?UTF-8?Q?${"=C3=A9".repeat(10)}?=`

    expect(encoded).toBe(`${word}\r\n ${word}`)
    expect(word.length).toBeLessThanOrEqual(75)
  })
})

describe("encodeHeaderText", () => {
  it("leaves ASCII untouched", () => {
    expect(encodeHeaderText("Quarterly report")).toBe("Quarterly report")
  })

  it("encodes non-ASCII text", () => {
    expect(encodeHeaderText("Olá")).toBe("=?UTF-8?Q?Ol=C3=A1?=")
  })
})

describe("quoteString", () => {
  it("escapes quotes and backslashes", () => {
    expect(quoteString('say "hi" \\o/')).toBe('"say \\"hi\\" \\\\o/"')
  })
})

describe("formatParameter", () => {
  it("quotes ASCII values", () => {
    expect(formatParameter("filename", "report.pdf")).toBe('filename="report.pdf"')
  })

  it("uses the RFC 2231 form for non-ASCII values", () => {
    expect(formatParameter("filename", "résumé.pdf")).toBe("filename*=UTF-8''r%C3%A9sum%C3%A9.pdf")
    expect(formatParameter("name", "ç'a.txt")).toBe("name*=UTF-8''%C3%A7%27a.txt")
  })
})

describe("dotStuff", () => {
  it("doubles leading dots and appends the terminator", () => {
    expect(dotStuff(".hidden\nline\n.")).toBe("..hidden\r\nline\r\n..\r\n.\r\n")
  })

  it("does not add a second CRLF before the terminator", () => {
    expect(dotStuff("body\r\n")).toBe("body\r\n.\r\n")
  })

  it("leaves dots inside a line alone", () => {
    expect(dotStuff("a.b\r\n")).toBe("a.b\r\n.\r\n")
  })
})
