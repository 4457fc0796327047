/**
 * Error hierarchy - Unit Tests
 */

import {
  AppError,
  ErrorSeverity,
  GeometryError,
  InputsNotFoundError,
  NotFoundError,
  OperationError,
  SerializationError,
  PageXmlError,
  InternalError,
  isAppError,
  isOperationalError,
  toAppError,
} from '../index';

describe('@pageplus/errors', () => {
  describe('AppError subclasses', () => {
    it('should carry code, exit code and severity', () => {
      const error = new PageXmlError('a.xml is not a PAGE-XML document', { source: 'a.xml' });

      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('PageXmlError');
      expect(error.code).toBe('PAGE_XML_ERROR');
      expect(error.exitCode).toBe(4);
      expect(error.severity).toBe(ErrorSeverity.MEDIUM);
      expect(error.context).toEqual({ source: 'a.xml' });
    });

    it('should list the inputs of an empty batch', () => {
      const error = new InputsNotFoundError(['a', 'b']);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe('INPUTS_NOT_FOUND');
      expect(error.message).toBe('No PAGE-XML files found for the given inputs: a, b');
      expect(error.context).toEqual({ inputs: ['a', 'b'] });
    });

    it('should name an empty input list', () => {
      expect(new InputsNotFoundError([]).message).toBe(
        'No PAGE-XML files found for the given inputs: <none>'
      );
    });

    it('should keep the output path of a failed write', () => {
      const error = new SerializationError('write failed', '/tmp/out.xml', new Error('EACCES'));

      expect(error.context).toEqual({ outputPath: '/tmp/out.xml', originalError: 'EACCES' });
      expect(error.exitCode).toBe(6);
    });

    it('should merge line context into a geometry error', () => {
      const error = new GeometryError('empty intersection', { operation: 'fit' });
      const located = error.withContext({ lineId: 'l1', regionId: 'r1' });

      expect(located).not.toBe(error);
      expect(located.message).toBe('empty intersection');
      expect(located.context).toEqual({ operation: 'fit', lineId: 'l1', regionId: 'r1' });
    });

    it('should serialize to JSON', () => {
      const json = new NotFoundError('missing', { path: 'x.xml' }).toJSON();

      expect(json).toMatchObject({
        error: 'NOT_FOUND',
        message: 'missing',
        exitCode: 3,
        severity: 'low',
        context: { path: 'x.xml' },
      });
    });
  });

  describe('toAppError', () => {
    it('should map permission errors to OperationError', () => {
      const converted = toAppError(Object.assign(new Error('permission denied'), { code: 'EACCES' }));

      expect(converted).toBeInstanceOf(OperationError);
      expect(converted.exitCode).toBe(1);
    });

    it('should pass AppErrors through', () => {
      const error = new PageXmlError('x');
      expect(toAppError(error)).toBe(error);
    });

    it('should map ENOENT to NotFoundError', () => {
      const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
      const converted = toAppError(error);

      expect(converted).toBeInstanceOf(NotFoundError);
      expect(converted.context).toEqual({ originalError: 'Error', code: 'ENOENT' });
    });

    it('should map file-system errors that are not Error instances', () => {
      const converted = toAppError({ name: 'Error', message: 'no such file', code: 'ENOENT' });

      expect(converted).toBeInstanceOf(NotFoundError);
      expect(converted.message).toBe('no such file');
      expect(converted.context).toEqual({ originalError: 'Error', code: 'ENOENT' });
    });

    it('should wrap unknown values as non-operational internal errors', () => {
      const converted = toAppError('boom');

      expect(converted).toBeInstanceOf(InternalError);
      expect(converted.context).toEqual({ error: 'boom' });
      expect(isOperationalError(converted)).toBe(false);
      expect(isAppError(converted)).toBe(true);
    });
  });
});
