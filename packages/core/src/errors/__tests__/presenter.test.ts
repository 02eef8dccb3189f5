import { afterEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../codes.js';
import { ErrorPresenter, renderCLIErrorView } from '../presenter.js';
import { FatalError, MappingError } from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const savedNoColor = process.env.NO_COLOR;
  afterEach(() => {
    if (savedNoColor === undefined) delete process.env.NO_COLOR;
    else process.env.NO_COLOR = savedNoColor;
  });

  it('formats title, location and the code hint', () => {
    const error = new FatalError({
      message: 'unexpected token',
      errorCode: ErrorCode.MODEL_PARSE_FAILED,
      context: { file: 'model.uvl', line: 7 },
    });
    const view = new ErrorPresenter('dev', { colors: false }).formatForCLI(error);
    expect(view).toEqual({
      title: 'Error E100: unexpected token',
      code: ErrorCode.MODEL_PARSE_FAILED,
      location: 'Location: model.uvl:7',
      workaround: 'Regenerate the model with `varimodel build`',
      colors: false,
    });
    expect(renderCLIErrorView(view)).toBe(
      [
        'Error E100: unexpected token',
        '  Location: model.uvl:7',
        '  Hint: Regenerate the model with `varimodel build`',
      ].join('\n')
    );
  });

  it('prefers suggestions attached to the error', () => {
    const error = new MappingError({ message: 'overlap', conflicts: [] });
    error.suggestions = ['Remove row 3'];
    const view = new ErrorPresenter('prod', { colors: false }).formatForCLI(error);
    expect(view.workaround).toBe('Remove row 3');
    expect(view.location).toBeUndefined();
  });

  it('disables colors when NO_COLOR is set', () => {
    process.env.NO_COLOR = '1';
    const error = new FatalError({ message: 'boom' });
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(error).colors).toBe(false);
  });

  it('production view omits the stack', () => {
    const error = new FatalError({ message: 'boom' });
    const json = new ErrorPresenter('prod').formatForProduction(error);
    expect(json.stack).toBeUndefined();
    expect(json.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
  });
});
