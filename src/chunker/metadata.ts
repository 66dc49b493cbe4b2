/**
 * Chunk metadata enrichment
 *
 * Cheap lexical facts about a chunk's text that downstream analysis uses
 * to order and group work: what it references and how dense it is.
 */

// $target, $var196_nested
const VARIABLE_REFERENCE = /\$(\w+)/g;
// <xsl:call-template name="vmf:vmf1_inputtoresult">
const TEMPLATE_CALL = /call-template\s+name\s*=\s*["']([^"']+)["']/g;
// fn:count($items), xs:string(@value)
const FUNCTION_CALL = /([A-Za-z_][\w-]*:[A-Za-z_][\w-]*)\s*\(/g;
// //Target, @value, ./child, ../parent, select="a/b"
const XPATH_EXPRESSION = /(\/\/|@\w+|\.\.\/|\.\/)[\w[\]/.():@-]*|select="[^"]*[/@]/g;
const CHOOSE_OPEN = /<xsl:choose[\s>]/g;
const DECLARATION_OPEN = /<xsl:(?:variable|param)\s/g;

export interface TextMetadata {
  dependencies: string[];
  hasChooseBlocks: boolean;
  hasVariables: boolean;
  hasXPath: boolean;
  complexityScore: number;
}

export function describeText(text: string): TextMetadata {
  const chooseCount = countMatches(text, CHOOSE_OPEN);
  const declarationCount = countMatches(text, DECLARATION_OPEN);
  const xpathCount = countMatches(text, XPATH_EXPRESSION);

  return {
    dependencies: extractDependencies(text),
    hasChooseBlocks: chooseCount > 0,
    hasVariables: declarationCount > 0,
    hasXPath: xpathCount > 0,
    complexityScore: complexityScore(text.length, chooseCount, declarationCount, xpathCount),
  };
}

/**
 * Sorted, unique `var:`, `template:` and `function:` references.
 */
export function extractDependencies(text: string): string[] {
  const dependencies = new Set<string>();

  for (const match of text.matchAll(VARIABLE_REFERENCE)) {
    dependencies.add(`var:${match[1]}`);
  }
  for (const match of text.matchAll(TEMPLATE_CALL)) {
    dependencies.add(`template:${match[1]}`);
  }
  for (const match of text.matchAll(FUNCTION_CALL)) {
    // Instruction names such as xsl:value-of are never followed by "("
    dependencies.add(`function:${match[1]}`);
  }

  return [...dependencies].sort();
}

/**
 * 1 + 0.5 per choose + 0.2 per declaration + 0.1 per XPath expression,
 * scaled per 1000 characters, capped at 10.
 */
export function complexityScore(
  length: number,
  chooseCount: number,
  declarationCount: number,
  xpathCount: number
): number {
  const base = 1 + chooseCount * 0.5 + declarationCount * 0.2 + xpathCount * 0.1;
  const scaled = length > 0 ? base * (length / 1000) : base;
  return Math.round(Math.min(scaled, 10) * 100) / 100;
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}
