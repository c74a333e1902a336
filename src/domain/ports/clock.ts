/** Source of "now". Dates are `YYYY-MM-DD`, times `HH:mm:ss`, both local. */
export interface IClock {
  today(): string;
  now(): string;
}
