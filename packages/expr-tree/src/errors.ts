/** Base class for every error raised by expression operations. */
export class ExpressionError extends Error {
	override name = 'ExpressionError'
}

/** Malformed textual input. `position` is the index of the offending token. */
export class ParseError extends ExpressionError {
	override name = 'ParseError'
	readonly position: number
	readonly token: string | undefined

	constructor(message: string, position: number, token?: string) {
		super(message)
		this.position = position
		this.token = token
	}
}

export class UnknownOperatorError extends ParseError {
	override name = 'UnknownOperatorError'

	constructor(position: number, token: string) {
		super(
			`Unknown operator '${token}' at token ${position}. Expected one of: + - * / **`,
			position,
			token,
		)
	}
}

export class UndefinedVariableError extends ExpressionError {
	override name = 'UndefinedVariableError'
	readonly variable: string

	constructor(variable: string) {
		super(`Variable '${variable}' has no binding`)
		this.variable = variable
	}
}

export class NotConstantExponentError extends ExpressionError {
	override name = 'NotConstantExponentError'
	readonly exponent: string

	constructor(exponent: string) {
		super(`Cannot differentiate a power with non-constant exponent '${exponent}'`)
		this.exponent = exponent
	}
}
