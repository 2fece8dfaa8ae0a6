export interface IdGenerator<T> {
  generate(): T
}
