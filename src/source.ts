interface Position {
  line: number
  column: number
  index: number
}

interface Span {
  start: Position
  end: Position
}

/**
 * One character per call, "" once the input is exhausted.
 */
interface CharSource {
  next(): string
}

class StringSource implements CharSource {
  private chars: string[]
  private pos = 0

  constructor(input: string) {
    // code points, so a surrogate pair is one character
    this.chars = Array.from(input)
  }

  next(): string {
    return this.chars[this.pos++] ?? ""
  }
}

export { StringSource }
export type { CharSource, Position, Span }
