import { resolveModelByPriority } from '../../../domain/model-endpoint/services/model-resolution-policy';
import { ConfigurationError } from '../../../shared/errors/assist-errors';

describe('resolveModelByPriority', () => {
  it.each([
    [{ cliModel: 'cli-model', defaultModel: 'default-model' }, { model: 'cli-model', source: 'cli' }],
    [{ cliModel: ' cli-model ', defaultModel: '' }, { model: 'cli-model', source: 'cli' }],
    [{ cliModel: '  ', defaultModel: ' default-model ' }, { model: 'default-model', source: 'default' }],
    [{ defaultModel: 'gpt-4' }, { model: 'gpt-4', source: 'default' }],
  ])('resolves %j', (input, expected) => {
    expect(resolveModelByPriority(input)).toEqual(expected);
  });

  it('fails with a configuration error when no model is available', () => {
    expect(() => resolveModelByPriority({ defaultModel: '   ' })).toThrow(
      ConfigurationError,
    );
  });
});
