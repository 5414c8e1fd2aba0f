import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { AssignmentInvariantError, ConfigurationError } from '@comidas/shared';

import { isProduction } from '../config/env.js';

export const errorHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  void _next;

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Datos inválidos',
      issues: err.issues,
    });
    return;
  }

  // Bad sign-up data: the message goes back to the user as is.
  if (err instanceof ConfigurationError) {
    res.status(422).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  if (err instanceof AssignmentInvariantError) {
    console.error('[assignment-invariant]', err.check, err.message);
    res.status(500).json({
      error: 'El reparto no superó la validación interna',
      code: 'assignment_invariant',
    });
    return;
  }

  if (err instanceof Error) {
    console.error('[unhandled-error]', err.message, err.stack);
    res.status(500).json({
      error: isProduction ? 'Error interno del servidor' : err.message,
    });
    return;
  }

  console.error('[unhandled-error]', err);
  res.status(500).json({ error: 'Error inesperado' });
};
