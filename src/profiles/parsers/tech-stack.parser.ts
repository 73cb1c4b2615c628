import { MAX_TECH_STACK_ITEMS } from "../../shared/constants";

const SEPARATORS: ReadonlyArray<string> = [",", ";", "|", "\n", " and ", " & "];

export function extractTechStack(text: string): string[] | null {
  const pieces = SEPARATORS.reduce<string[]>(
    (items, separator) => items.flatMap((item) => item.split(separator)),
    [text],
  );

  const stack = pieces
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 1)
    .slice(0, MAX_TECH_STACK_ITEMS);

  return stack.length > 0 ? stack : null;
}
