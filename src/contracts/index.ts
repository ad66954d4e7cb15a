export * from "./directory-driver.contract";
export * from "./scope.contract";
