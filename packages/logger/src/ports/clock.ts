export type Milliseconds = number

export type Clock = {
  now(): Date
}
