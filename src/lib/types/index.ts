export type {
  CatalogRecord,
  Instrument,
  OptionType,
  PricingMode,
  Quote,
  QuoteLookup
} from "./options";
export type {
  ChainRequest,
  ChainResponse,
  ChainRow,
  DroppedInstrument,
  MalformedInstrumentCode,
  NearestExpirySelection
} from "./chain";
