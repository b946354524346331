export declare const sharedConfig: {
  test: {
    environment: "node";
  };
};
