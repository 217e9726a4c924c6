import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(data: T) {
    this.data = Object.freeze({ ...data })
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }
}
