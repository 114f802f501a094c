// datamask ships without type declarations
declare module 'datamask' {
  interface DataMask {
    string(value: string, maskChar?: string, maxLength?: number): string;
  }

  const datamask: DataMask;
  export default datamask;
}
