import type { ModelSignature } from '@forkline/core';

/** Example request and response the registered model is published with. */
export const MODEL_SIGNATURE: ModelSignature = {
  input: {
    island: 'Biscoe',
    culmen_length_mm: 48.6,
    culmen_depth_mm: 16.0,
    flipper_length_mm: 230.0,
    body_mass_g: 5800.0,
    sex: 'MALE'
  },
  output: { prediction: 'Adelie', confidence: 0.9 },
  params: { data_capture: false }
};

/** Packages the serving environment installs next to the model. */
export const MODEL_REQUIREMENTS: readonly string[] = [
  'scikit-learn==1.5.2',
  'pandas==2.2.3',
  'numpy==1.26.4',
  'keras==3.6.0',
  'jax[cpu]==0.4.35'
];
