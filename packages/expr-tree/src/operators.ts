import { AddNode, DivideNode, MultiplyNode, PowerNode, SubtractNode } from './nodes.ts'
import type { BinaryNode, BinaryOperator, ExprNode, OperatorInfo } from './types.ts'

export const LEAF_PRECEDENCE = Number.POSITIVE_INFINITY

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
	'add',
	'subtract',
	'multiply',
	'divide',
	'power',
]

export const OPERATORS: Readonly<Record<BinaryOperator, OperatorInfo>> = {
	add: {
		symbol: '+',
		label: 'Add',
		precedence: 1,
		wrapLeft: false,
		wrapRight: false,
		compute: (a, b) => a + b,
	},
	subtract: {
		symbol: '-',
		label: 'Sub',
		precedence: 1,
		wrapLeft: false,
		wrapRight: true,
		compute: (a, b) => a - b,
	},
	multiply: {
		symbol: '*',
		label: 'Mul',
		precedence: 2,
		wrapLeft: false,
		wrapRight: false,
		compute: (a, b) => a * b,
	},
	divide: {
		symbol: '/',
		label: 'Div',
		precedence: 2,
		wrapLeft: false,
		wrapRight: true,
		compute: (a, b) => a / b,
	},
	// Right-associative: a ** b ** c reads as a ** (b ** c)
	power: {
		symbol: '**',
		label: 'Pow',
		precedence: 3,
		wrapLeft: true,
		wrapRight: false,
		compute: (a, b) => a ** b,
	},
}

const BY_SYMBOL: ReadonlyMap<string, BinaryOperator> = new Map(
	BINARY_OPERATORS.map((op): [string, BinaryOperator] => [OPERATORS[op].symbol, op]),
)

export function operatorForSymbol(symbol: string): BinaryOperator | undefined {
	return BY_SYMBOL.get(symbol)
}

export function precedenceOf(node: ExprNode): number {
	return node.kind === 'number' || node.kind === 'variable'
		? LEAF_PRECEDENCE
		: OPERATORS[node.kind].precedence
}

export function createBinary(op: BinaryOperator, left: ExprNode, right: ExprNode): BinaryNode {
	switch (op) {
		case 'add':
			return new AddNode(left, right)
		case 'subtract':
			return new SubtractNode(left, right)
		case 'multiply':
			return new MultiplyNode(left, right)
		case 'divide':
			return new DivideNode(left, right)
		case 'power':
			return new PowerNode(left, right)
	}
}
