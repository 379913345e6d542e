import { Provider } from '@nestjs/common';
import { random } from 'lodash';
import { RandomInt } from './optimizer.interface';

export const RANDOM_INT = 'RANDOM_INT';

export const randomIntProvider: Provider<RandomInt> = {
  provide: RANDOM_INT,
  useValue: (min: number, max: number) => random(min, max),
};
