// Cached quote for a single symbol
export class QuoteResponseDto {
  symbol!: string;
  price!: number;
  retrievedAt!: string;            // ISO timestamp
}

// One hit of a symbol text search
export class SymbolMatchDto {
  symbol!: string;
  name!: string;
  exchange!: string;
  type!: string;
}
