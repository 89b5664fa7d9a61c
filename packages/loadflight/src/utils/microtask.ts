function promiseMicrotask(fn: () => void) {
  Promise.resolve()
    .then(fn)
    .catch((error: unknown) => {
      setTimeout(() => {
        throw error;
      });
    });
}

export const microtask: (fn: () => void) => void =
  typeof queueMicrotask === "function" ? queueMicrotask : promiseMicrotask;
