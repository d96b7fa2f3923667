import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { Transform } from 'class-transformer';

import { CURRENCY_CODE_PATTERN } from '../../exchange-rates/dto/currency.dto.js';
import {
  MAX_PRECISION,
  MIN_PRECISION,
} from '../../precision/precision.types.js';

const normalizeCode = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

/**
 * A calculation as the caller hands it in. Operands stay strings until the
 * engine parses them, so literal errors reach healing as numeric-literal
 * failures rather than request failures.
 */
export class CalculationRequestDto {
  @IsString()
  @IsNotEmpty()
  operation!: string;

  @IsString()
  operand1!: string;

  @IsOptional()
  @IsString()
  operand2?: string | null;

  @Transform(normalizeCode)
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'currencyFrom must be 3-6 uppercase letters or digits',
  })
  currencyFrom!: string;

  @Transform(normalizeCode)
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'currencyTo must be 3-6 uppercase letters or digits',
  })
  currencyTo!: string;

  @IsOptional()
  @IsInt()
  @Min(MIN_PRECISION)
  @Max(MAX_PRECISION)
  precisionOverride?: number;
}

/** Plain input accepted by CalculationService.calculate. */
export type CalculationRequest = Pick<
  CalculationRequestDto,
  'operation' | 'operand1' | 'operand2' | 'currencyFrom' | 'currencyTo' | 'precisionOverride'
>;
