export interface IdGenerator<T extends string = string> {
  generate(): T
}
