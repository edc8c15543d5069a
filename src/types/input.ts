/**
 * Input Types
 *
 * Rows read from an uploaded CSV, in either address or ZIP mode.
 */

export type InputMode = 'address' | 'zip'

interface BaseRow {
  /** Raw cell values keyed by header, including pass-through columns */
  readonly columns: Readonly<Record<string, string>>
}

export interface AddressRow extends BaseRow {
  readonly mode: 'address'
  readonly accountId: string
  readonly street: string
  readonly city: string
  readonly state: string
  readonly zipcode: string
}

export interface ZipRow extends BaseRow {
  readonly mode: 'zip'
  readonly zipcode: string
  readonly householdCount: number
}

export type InputRow = AddressRow | ZipRow

/**
 * Parsed CSV table: header order plus typed rows.
 */
export interface InputTable<R extends InputRow = InputRow> {
  readonly mode: R['mode']
  readonly columns: readonly string[]
  readonly rows: readonly R[]
}
