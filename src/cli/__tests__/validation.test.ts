/**
 * CLI Validation Tests
 */

import { describe, it, expect } from 'vitest';

import {
  AskArgsSchema,
  ConversationOptionsSchema,
  IndexOptionsSchema,
  ServeOptionsSchema,
  validateInput,
} from '../validation.js';

describe('IndexOptionsSchema', () => {
  it('should normalize the extension list', () => {
    expect(IndexOptionsSchema.parse({ extensions: 'py, .TS,js,' })).toEqual({
      extensions: ['py', 'ts', 'js'],
      dryRun: false,
      force: false,
    });
  });

  it('should leave extensions unset when not given', () => {
    expect(IndexOptionsSchema.parse({ dryRun: true })).toEqual({ dryRun: true, force: false });
  });
});

describe('ServeOptionsSchema', () => {
  it('should coerce the port', () => {
    expect(ServeOptionsSchema.parse({ port: '8080', host: '0.0.0.0' })).toEqual({
      port: 8080,
      host: '0.0.0.0',
    });
  });

  it('should reject ports out of range', () => {
    expect(ServeOptionsSchema.safeParse({ port: '70000' }).success).toBe(false);
    expect(ServeOptionsSchema.safeParse({ port: '-1' }).success).toBe(false);
  });
});

describe('ConversationOptionsSchema', () => {
  it('should default the conversation id', () => {
    expect(ConversationOptionsSchema.parse({})).toEqual({ conversation: 'default' });
  });
});

describe('validateInput', () => {
  it('should return parsed data on success', () => {
    expect(validateInput(AskArgsSchema, { question: '  why?  ' })).toEqual({
      success: true,
      data: { question: 'why?' },
    });
  });

  it('should prefix each issue with its path', () => {
    expect(validateInput(AskArgsSchema, { question: '   ' })).toEqual({
      success: false,
      error: 'Validation failed:\n  question: Question cannot be empty',
    });
    expect(validateInput(ServeOptionsSchema, { port: 'abc' })).toEqual({
      success: false,
      error: 'Validation failed:\n  port: port must be an integer between 0 and 65535',
    });
  });
});
