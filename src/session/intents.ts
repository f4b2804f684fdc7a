export type Intent =
  | { readonly type: "quit" }
  | { readonly type: "scrollUp"; readonly amount: number }
  | { readonly type: "scrollDown"; readonly amount: number }
  | { readonly type: "pageUp" }
  | { readonly type: "pageDown" }
  | { readonly type: "halfPageUp" }
  | { readonly type: "halfPageDown" }
  | { readonly type: "resize"; readonly width: number; readonly height: number }
  | { readonly type: "goTop" }
  | { readonly type: "goBottom" }
  | { readonly type: "tabLeft" }
  | { readonly type: "tabRight" }
  | { readonly type: "enterHelp" }
  | { readonly type: "exitHelp" }
  | { readonly type: "enterCommandMode" }
  | { readonly type: "commandChar"; readonly value: string }
  | { readonly type: "commandBackspace" }
  | { readonly type: "commandSubmit" }
  | { readonly type: "commandCancel" }
  | { readonly type: "enterSearchMode" }
  | { readonly type: "searchChar"; readonly value: string }
  | { readonly type: "searchBackspace" }
  | { readonly type: "searchSubmit" }
  | { readonly type: "searchCancel" }
  | { readonly type: "searchNext" }
  | { readonly type: "searchPrev" }
  | { readonly type: "searchClear" }

export const keepsStatusMessage = (intent: Intent): boolean => intent.type === "resize" || intent.type === "quit"
