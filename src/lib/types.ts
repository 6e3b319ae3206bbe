export type TokenType = "WORD" | "NUMBER" | "PUNCT" | "URL" | "EMAIL";

export type Token = {
  idx: number;
  raw: string;      // word, number, single punctuation char, url or email
  type: TokenType;
  start: number;
  end: number;      // exclusive
};
