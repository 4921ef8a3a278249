export { generateTip, tipForCategory, type TipInput } from './tip-generator.js'
export {
  CATEGORY_TIPS,
  GENERIC_TIP,
  NO_DATA_TIP,
  UNCATEGORIZED_TIP,
  TOP_CATEGORY_COUNT,
} from './tip-rules.js'
