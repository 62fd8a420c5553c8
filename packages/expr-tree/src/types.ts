import type {
	AddNode,
	DivideNode,
	MultiplyNode,
	NumberNode,
	PowerNode,
	SubtractNode,
	VariableNode,
} from './nodes.ts'

export type BinaryOperator = 'add' | 'subtract' | 'multiply' | 'divide' | 'power'

export type BinaryNode = AddNode | SubtractNode | MultiplyNode | DivideNode | PowerNode

/**
 * Internal tree representation. Closed union discriminated by `kind`;
 * every operation over it is a single exhaustive switch.
 */
export type ExprNode = NumberNode | VariableNode | BinaryNode

/**
 * Variable values supplied to evaluation
 */
export type Bindings = ReadonlyMap<string, number> | Readonly<Record<string, number>>

/**
 * Printing constants shared by every node of one operator
 */
export interface OperatorInfo {
	readonly symbol: string
	readonly label: string
	readonly precedence: number
	/** Parenthesize a left child of equal precedence */
	readonly wrapLeft: boolean
	/** Parenthesize a right child of equal precedence */
	readonly wrapRight: boolean
	readonly compute: (a: number, b: number) => number
}

export interface ParseOptions {
	/**
	 * Require the closing `)` of every application and reject tokens after
	 * the first complete expression.
	 * @default false
	 */
	readonly strict?: boolean
	/**
	 * Deepest parenthesis nesting accepted.
	 * @default 1000
	 */
	readonly maxDepth?: number
}
