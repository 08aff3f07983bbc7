import type { Parser } from './parser';
import {
  ASTNodeType,
  FunctionDeclaration,
  Parameter,
  Program,
  Requirement,
  TokenType,
  TypeAnnotation,
} from '../types';

export function parseProgram(this: Parser): Program {
  const program: Program = {
    type: ASTNodeType.PROGRAM,
    location: this.peek().location,
    metadata: {},
    declarations: [],
  };

  this.skipNewlines();
  while (!this.isAtEnd()) {
    // Only function declarations are supported at top level
    if (!this.match(TokenType.FUNCTION)) throw this.unexpected();
    program.declarations.push(this.parseFunction());
    this.skipNewlines();
  }

  return program;
}

/** Parses a function after its `function` keyword has been consumed. */
export function parseFunction(this: Parser): FunctionDeclaration {
  const location = this.previous().location;
  const name = this.expect(TokenType.IDENTIFIER, 'Expected function name').lexeme;
  this.expect(TokenType.COLON, "Expected ':' after function name");
  this.skipNewlines();

  let inputs: Parameter[] = [];
  let outputs: Parameter[] = [];
  let requirements: Requirement[] = [];

  if (this.match(TokenType.INPUTS)) {
    this.expect(TokenType.COLON, "Expected ':' after 'inputs'");
    this.skipNewlines();
    inputs = this.parseParameterList();
    this.skipNewlines();
  }

  if (this.match(TokenType.OUTPUTS)) {
    this.expect(TokenType.COLON, "Expected ':' after 'outputs'");
    this.skipNewlines();
    outputs = this.parseParameterList();
    this.skipNewlines();
  }

  if (this.match(TokenType.REQUIREMENTS)) {
    this.expect(TokenType.COLON, "Expected ':' after 'requirements'");
    this.skipNewlines();
    requirements = this.parseRequirementList();
    this.skipNewlines();
  }

  this.expect(TokenType.IMPLEMENTATION, "Expected 'implementation'");
  this.expect(TokenType.COLON, "Expected ':' after 'implementation'");
  this.skipNewlines();

  const body = this.parseBlock();

  return {
    type: ASTNodeType.FUNCTION,
    location,
    metadata: {},
    name,
    inputs,
    outputs,
    requirements,
    body,
  };
}

export function parseParameterList(this: Parser): Parameter[] {
  const params: Parameter[] = [];

  while (
    !this.check(TokenType.OUTPUTS) &&
    !this.check(TokenType.REQUIREMENTS) &&
    !this.check(TokenType.IMPLEMENTATION) &&
    !this.isAtEnd()
  ) {
    if (this.check(TokenType.NEWLINE)) {
      this.skipNewlines();
      if (!this.check(TokenType.IDENTIFIER)) break;
    }

    params.push(this.parseParameter());

    if (!this.match(TokenType.NEWLINE)) break;
  }

  return params;
}

export function parseParameter(this: Parser): Parameter {
  const nameToken = this.expect(TokenType.IDENTIFIER, 'Expected parameter name');
  let typeAnnotation: TypeAnnotation | null = null;

  if (this.match(TokenType.COLON)) {
    typeAnnotation = this.parseTypeAnnotation();
    // `where` constraints are recognized but not represented
    if (this.match(TokenType.WHERE)) {
      while (!this.check(TokenType.NEWLINE) && !this.isAtEnd()) {
        this.advance();
      }
    }
  }

  return {
    type: ASTNodeType.PARAMETER,
    location: nameToken.location,
    metadata: {},
    name: nameToken.lexeme,
    typeAnnotation,
  };
}

export function parseTypeAnnotation(this: Parser): TypeAnnotation {
  const nameToken = this.expect(TokenType.IDENTIFIER, 'Expected type name');
  const typeArgs: TypeAnnotation[] = [];

  if (this.match(TokenType.LT)) {
    do {
      typeArgs.push(this.parseTypeAnnotation());
    } while (this.match(TokenType.COMMA));
    this.splitShift();
    this.expect(TokenType.GT, "Expected '>' after type arguments");
  }

  return {
    type: ASTNodeType.TYPE_ANNOTATION,
    location: nameToken.location,
    metadata: {},
    name: nameToken.lexeme,
    typeArgs,
  };
}

export function parseRequirementList(this: Parser): Requirement[] {
  const requirements: Requirement[] = [];

  while (!this.check(TokenType.IMPLEMENTATION) && !this.isAtEnd()) {
    if (this.check(TokenType.NEWLINE)) {
      this.skipNewlines();
      if (!this.check(TokenType.MINUS)) break;
    }

    const dash = this.expect(TokenType.MINUS, "Expected '-' before requirement");
    const words: string[] = [];
    while (!this.check(TokenType.NEWLINE) && !this.isAtEnd()) {
      words.push(this.advance().lexeme);
    }

    requirements.push({
      type: ASTNodeType.REQUIREMENT,
      location: dash.location,
      metadata: {},
      description: words.join(' '),
    });
  }

  return requirements;
}
