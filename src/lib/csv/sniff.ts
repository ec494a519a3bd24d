import type { Delimiter } from "@/types";

export interface DelimiterSniffer {
  sniff: (text: string) => Delimiter;
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (let i = text.indexOf(char); i !== -1; i = text.indexOf(char, i + 1)) count++;
  return count;
}

/**
 * Counts every `;` and `,` in the whole text, quoted or not, and picks `;`
 * only when it strictly outnumbers `,`.
 */
export const characterCountSniffer: DelimiterSniffer = {
  sniff(text) {
    return countChar(text, ";") > countChar(text, ",") ? ";" : ",";
  },
};
