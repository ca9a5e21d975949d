// ---------------------------------------------------------------------------
// Document order of the keys in a JSON document's top-level sections.
// JSON.parse lists integer-like keys first, in ascending order, so the order
// in which ids were written is read back from the text itself.
// ---------------------------------------------------------------------------

/** Section name → its keys in the order they appear in the text. */
export type SectionKeyOrder = ReadonlyMap<string, readonly string[]>;

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

/** Walks text that JSON.parse has already accepted. */
class JsonCursor {
  private pos = 0;

  constructor(private readonly text: string) {}

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWhitespace(): void {
    while (WHITESPACE.has(this.peek())) this.pos++;
  }

  /** Consume `char` if it is next after whitespace. */
  take(char: string): boolean {
    this.skipWhitespace();
    if (this.peek() !== char) return false;
    this.pos++;
    return true;
  }

  readString(): string {
    const start = this.pos;
    this.pos++;
    while (this.pos < this.text.length && this.peek() !== '"') {
      this.pos += this.peek() === "\\" ? 2 : 1;
    }
    this.pos++;
    const value: unknown = JSON.parse(this.text.slice(start, this.pos));
    return typeof value === "string" ? value : "";
  }

  skipValue(): void {
    this.skipWhitespace();
    const first = this.peek();

    if (first === '"') {
      this.readString();
      return;
    }

    if (first === "{" || first === "[") {
      let depth = 0;
      do {
        const char = this.peek();
        if (char === '"') {
          this.readString();
          continue;
        }
        if (char === "{" || char === "[") depth++;
        else if (char === "}" || char === "]") depth--;
        this.pos++;
      } while (depth > 0 && this.pos < this.text.length);
      return;
    }

    // number, true, false, null
    while (
      this.pos < this.text.length &&
      !",}]".includes(this.peek()) &&
      !WHITESPACE.has(this.peek())
    ) {
      this.pos++;
    }
  }

  /**
   * Step through the object at the cursor. `onEntry` receives each key with
   * the cursor on its value, and must consume that value.
   */
  readObject(onEntry: (key: string) => void): void {
    this.take("{");
    if (this.take("}")) return;
    do {
      this.skipWhitespace();
      const key = this.readString();
      this.take(":");
      this.skipWhitespace();
      onEntry(key);
    } while (this.take(","));
    this.take("}");
  }
}

/**
 * Keys of each object-valued `sections` entry of the top-level object, in
 * document order. A key repeated within a section keeps its first position,
 * as JSON.parse does. `text` must already be valid JSON.
 */
export function readSectionKeyOrder(
  text: string,
  sections: readonly string[],
): SectionKeyOrder {
  const order = new Map<string, string[]>();
  const cursor = new JsonCursor(text);

  cursor.skipWhitespace();
  if (cursor.peek() !== "{") return order;

  cursor.readObject((section) => {
    if (!sections.includes(section) || cursor.peek() !== "{") {
      cursor.skipValue();
      return;
    }
    const keys = new Set<string>();
    cursor.readObject((key) => {
      keys.add(key);
      cursor.skipValue();
    });
    order.set(section, [...keys]);
  });

  return order;
}
