// makes a Record<K, V> a union of all its variants, one `{ type, data }` per key.
// variants whose payload is `undefined` carry no data
export type TaggedEnum<T> = {
  [K in Extract<keyof T, string>]: [T[K]] extends [undefined]
    ? { readonly type: K; readonly data?: undefined }
    : { readonly type: K; readonly data: T[K] };
}[Extract<keyof T, string>];
