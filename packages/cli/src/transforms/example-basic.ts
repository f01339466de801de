/**
 * Built-in example transform
 *
 * Expects an input schema with a numeric `x`, a numeric `y` and a string `s`.
 */

import { applyVocabulary, centered, defineTransform, mean, scale01, scaleTo01, vocabulary } from '@prepflow/engine';

export const exampleBasicTransform = defineTransform({
  id: 'example.basic',
  version: '1',
  description: 'Centers x, scales y to [0, 1] and integerizes s',
  analyzers: {
    xMean: mean('x'),
    yRange: scale01('y'),
    sVocab: vocabulary('s'),
  },
  outputs: {
    s_integerized: { valueType: 'int' },
  },
  fn: (record, constants) => ({
    x_centered: centered(record.x, constants.get('xMean')),
    y_normalized: scaleTo01(record.y, constants.get('yRange')),
    s_integerized: applyVocabulary(record.s, constants.get('sVocab')),
  }),
});
