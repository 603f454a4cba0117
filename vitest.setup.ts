const isStorage = (value: unknown): value is Storage =>
  typeof value === 'object' &&
  value !== null &&
  typeof Reflect.get(value, 'setItem') === 'function' &&
  typeof Reflect.get(value, 'removeItem') === 'function';

const ensureStorage = (key: 'localStorage' | 'sessionStorage') => {
  if (isStorage(Reflect.get(globalThis, key))) {
    return;
  }

  const store = new Map<string, string>();

  const storage = {
    get length() {
      return store.size;
    },
    clear() {
      store.clear();
    },
    getItem(name: string) {
      return store.get(name) ?? null;
    },
    key(index: number) {
      return Array.from(store.keys())[index] ?? null;
    },
    removeItem(name: string) {
      store.delete(name);
    },
    setItem(name: string, value: string) {
      store.set(String(name), String(value));
    },
  } satisfies Storage;

  Object.defineProperty(globalThis, key, {
    value: storage,
    configurable: true,
    writable: false,
  });
};

ensureStorage('localStorage');
ensureStorage('sessionStorage');

// Ensure React testing utilities run without extra warnings
Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);
