export type OutputWriter = (message: string) => Promise<void>;

export const writeStdout: OutputWriter = async (message) => {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
};
