export { useOperationState, useStepProgress, useListItems } from "./hooks";
