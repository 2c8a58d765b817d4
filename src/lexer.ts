import { StringSource } from "./source.js"
import type { CharSource, Position, Span } from "./source.js"

type TokenType = "eof" | "def" | "extern" | "IDENTIFIER" | "NUMBER" | "CHAR"

interface TokenBase {
  position: Span
}

interface EofToken extends TokenBase {
  type: "eof"
}

interface KeywordToken extends TokenBase {
  type: "def" | "extern"
}

interface IdentifierToken extends TokenBase {
  type: "IDENTIFIER"
  value: string
}

interface NumberToken extends TokenBase {
  type: "NUMBER"
  value: number
  text: string
}

/** Any other single character: operators and punctuation. */
interface CharToken extends TokenBase {
  type: "CHAR"
  value: string
}

type Token = EofToken | KeywordToken | IdentifierToken | NumberToken | CharToken

const KEYWORDS = new Map<string, "def" | "extern">([
  ["def", "def"],
  ["extern", "extern"],
])

const isSpace = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\v" || c === "\f" || c === "\r"
const isAlpha = (c: string) => /^[A-Za-z]$/.test(c)
const isDigit = (c: string) => /^[0-9]$/.test(c)
const isAlnum = (c: string) => isAlpha(c) || isDigit(c)

// "1.2.3" reads as 1.2 and a lone "." as 0, never NaN
function parseNumber(text: string): number {
  const value = parseFloat(text)
  return Number.isNaN(value) ? 0 : value
}

class Lexer {
  private source: CharSource
  // one character of lookahead; starts as a space so the first call reads
  private lastChar = " "
  private line = 1
  private column = 0
  private index = -1

  constructor(source: CharSource | string) {
    this.source = typeof source === "string" ? new StringSource(source) : source
  }

  private currentPosition(): Position {
    return { line: this.line, column: this.column, index: this.index }
  }

  private advance(): string {
    // at end of input the position stays put, one past the last character
    if (this.lastChar !== "") {
      if (this.lastChar === "\n") {
        this.line++
        this.column = 0
      }
      this.column++
      this.index++
    }
    this.lastChar = this.source.next()
    return this.lastChar
  }

  // end position: just past the last consumed character
  private endPosition(start: Position, length: number): Position {
    return { line: start.line, column: start.column + length, index: start.index + length }
  }

  nextToken(): Token {
    while (isSpace(this.lastChar)) {
      this.advance()
    }

    const start = this.currentPosition()

    if (isAlpha(this.lastChar)) {
      let text = this.lastChar
      while (isAlnum(this.advance())) {
        text += this.lastChar
      }
      const position = { start, end: this.endPosition(start, text.length) }
      const keyword = KEYWORDS.get(text)
      if (keyword) {
        return { type: keyword, position }
      }
      return { type: "IDENTIFIER", value: text, position }
    }

    if (isDigit(this.lastChar) || this.lastChar === ".") {
      let text = ""
      do {
        text += this.lastChar
        this.advance()
      } while (isDigit(this.lastChar) || this.lastChar === ".")
      return {
        type: "NUMBER",
        value: parseNumber(text),
        text,
        position: { start, end: this.endPosition(start, text.length) },
      }
    }

    if (this.lastChar === "#") {
      do {
        this.advance()
      } while (this.lastChar !== "" && this.lastChar !== "\n" && this.lastChar !== "\r")

      if (this.lastChar !== "") {
        return this.nextToken()
      }
    }

    if (this.lastChar === "") {
      return { type: "eof", position: { start, end: start } }
    }

    const value = this.lastChar
    this.advance()
    return { type: "CHAR", value, position: { start, end: this.endPosition(start, 1) } }
  }
}

/** Every token of `input`, the trailing eof included. */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input)
  const tokens: Token[] = []
  let token: Token
  do {
    token = lexer.nextToken()
    tokens.push(token)
  } while (token.type !== "eof")
  return tokens
}

export { Lexer, parseNumber }
export type { Token, TokenType, IdentifierToken, NumberToken, CharToken, Position }
