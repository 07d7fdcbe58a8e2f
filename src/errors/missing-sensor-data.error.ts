import { Data } from "effect";

export class MissingSensorDataError extends Data.TaggedError('MissingSensorData')<{
  temperature: number | null;
  humidity: number | null;
}> {
  public override readonly message = 'Board returned no temperature or humidity value.';
}
