export const sharedFlags = {
  dataDir: {
    type: String,
    alias: 'd',
    description:
      'Directory holding the store files (default: $CAR_RENTAL_DATA_DIR or ./data)'
  }
}

export interface SharedFlags {
  dataDir?: string
}
