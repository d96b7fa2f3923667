import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

import type { CurrencyKind } from '../../../common/types/index.js';

export const CURRENCY_CODE_PATTERN = /^[A-Z0-9]{3,6}$/;
const CURRENCY_KINDS: CurrencyKind[] = ['fiat', 'crypto', 'commodity'];

export class CurrencyDto {
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'code must be 3-6 uppercase letters or digits',
  })
  code!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsIn(CURRENCY_KINDS)
  kind!: CurrencyKind;

  @IsInt()
  @Min(0)
  @Max(18)
  decimalPlaces!: number;

  @IsOptional()
  @IsBoolean()
  active?: boolean = true;

  @IsOptional()
  @IsString()
  country?: string;
}

export class CurrenciesConfigDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => CurrencyDto)
  currencies!: CurrencyDto[];

  static validateDuplicates(currencies: CurrencyDto[]): string[] {
    const seen = new Set<string>();
    const errors: string[] = [];
    for (const currency of currencies) {
      if (seen.has(currency.code)) {
        errors.push(`Duplicate currency code: ${currency.code}`);
      }
      seen.add(currency.code);
    }
    return errors;
  }
}
