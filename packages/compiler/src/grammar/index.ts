import * as ohm from 'ohm-js'

/**
 * Form grammar.
 *
 * The reader renders each token as one character before matching, so an
 * input position is also a token index:
 *   (  left parenthesis
 *   )  right parenthesis
 *   a  atom
 *   s  quoted string
 *
 * All rules are lexical; the rendered input has no whitespace.
 */
const grammarSource = String.raw`
ScenarioForms {
  program (a program) = form*
  form (a form) = list | atom | string
  list (a list) = "(" form* ")"
  atom (an atom) = "a"
  string (a string) = "s"
}
`

/**
 * The compiled form grammar.
 */
export const FormGrammar: ohm.Grammar = ohm.grammar(grammarSource)
