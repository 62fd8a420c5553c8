// Constructors
export type { ExpressionInput } from './constructors.ts'
export {
	add,
	constant,
	divide,
	multiply,
	power,
	subtract,
	toExpression,
	variable,
} from './constructors.ts'

// Errors
export {
	ExpressionError,
	NotConstantExponentError,
	ParseError,
	UndefinedVariableError,
	UnknownOperatorError,
} from './errors.ts'

// Expression class (use constructor functions or `parse` to create instances)
export { Expression } from './expression.ts'

// Parsing
export { parse } from './parser.ts'
export { tokenize } from './tokenizer.ts'

// Types
export type { BinaryOperator, Bindings, ExprNode, ParseOptions } from './types.ts'
