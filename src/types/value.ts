export type Scalar = null | boolean | number | string;

export type Value = Scalar | Value[] | { [key: string]: Value };
