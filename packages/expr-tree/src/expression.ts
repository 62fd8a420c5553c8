import {
	add,
	divide,
	type ExpressionInput,
	multiply,
	power,
	subtract,
	toExpression,
} from './constructors.ts'
import { derive } from './derive.ts'
import { equals } from './equals.ts'
import { evaluate } from './evaluate.ts'
import { render, repr, serialize } from './render.ts'
import { simplify } from './simplify.ts'
import { collectVariables, substitute } from './substitute.ts'
import type { Bindings, ExprNode } from './types.ts'

/**
 * Immutable algebraic expression tree.
 * Every operation returns a new expression and leaves the receiver untouched.
 */
export class Expression {
	readonly node: ExprNode

	constructor(node: ExprNode) {
		this.node = node
	}

	/** Names of all variables occurring in the tree */
	get variables(): ReadonlySet<string> {
		return collectVariables(this.node)
	}

	add(other: ExpressionInput): Expression {
		return add(this, other)
	}

	subtract(other: ExpressionInput): Expression {
		return subtract(this, other)
	}

	multiply(other: ExpressionInput): Expression {
		return multiply(this, other)
	}

	divide(other: ExpressionInput): Expression {
		return divide(this, other)
	}

	power(exponent: ExpressionInput): Expression {
		return power(this, exponent)
	}

	// Single key-value binding
	bind(name: string, value: ExpressionInput): Expression

	// Record binding - substitute several variables at once
	bind(bindings: Readonly<Record<string, ExpressionInput>>): Expression

	bind(
		nameOrBindings: string | Readonly<Record<string, ExpressionInput>>,
		value?: ExpressionInput,
	): Expression {
		const nodeBindings = new Map<string, ExprNode>()
		if (typeof nameOrBindings === 'string') {
			if (value === undefined) {
				throw new TypeError(`Missing value for binding '${nameOrBindings}'`)
			}
			nodeBindings.set(nameOrBindings, toExpression(value).node)
		} else {
			for (const [name, input] of Object.entries(nameOrBindings)) {
				nodeBindings.set(name, toExpression(input).node)
			}
		}
		return new Expression(substitute(this.node, nodeBindings))
	}

	/**
	 * Evaluate to a number.
	 * Throws `UndefinedVariableError` when a variable has no binding.
	 */
	evaluate(bindings: Bindings = {}): number {
		return evaluate(this.node, bindings)
	}

	/**
	 * Derivative with respect to `name`, unsimplified.
	 * Throws `NotConstantExponentError` for powers whose exponent is not a literal number.
	 */
	derive(name: string): Expression {
		return new Expression(derive(this.node, name))
	}

	simplify(): Expression {
		return new Expression(simplify(this.node))
	}

	/** Structural equality: `x + 0` is not equal to `x` */
	equals(other: Expression): boolean {
		return equals(this.node, other.node)
	}

	render(): string {
		return render(this.node)
	}

	serialize(): string {
		return serialize(this.node)
	}

	repr(): string {
		return repr(this.node)
	}

	toString(): string {
		return this.render()
	}
}
