import * as tf from '@tensorflow/tfjs';

// no WebGL under Node; pin the pure-JS backend before any test builds tensors
await tf.setBackend('cpu');
await tf.ready();
