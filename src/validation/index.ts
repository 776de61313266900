import { object, array, number, type InferType } from 'yup'

// Histogram written by xia2.overload
const overloadSchema = object({
  bin_count: number().integer().min(0).required(),
  bins: array(number().min(0).required()).required(),
  scale_factor: number().positive().required()
})
  .required()
  .test(
    'bins-cover-bin-count',
    'bins must hold at least bin_count entries',
    (value) => !value || value.bins.length >= value.bin_count
  )

// The parts of a serialised experiment list the intensity check needs
const experimentListSchema = object({
  experiment: array(
    object({
      scan: number().integer().min(0).required(),
      profile: object({
        sigma_m: number().positive().required()
      }).required()
    }).required()
  )
    .min(1)
    .required(),
  scan: array(
    object({
      image_range: array(number().integer().required())
        .length(2)
        .required()
        .test(
          'ascending-image-range',
          'image_range must not end before it starts',
          (range) => !range || range[1] >= range[0]
        ),
      oscillation: array(number().required())
        .length(2)
        .required()
        .test(
          'positive-oscillation-width',
          'oscillation width must be positive',
          (osc) => !osc || osc[1] > 0
        )
    }).required()
  ).required()
}).required()

type OverloadData = InferType<typeof overloadSchema>
type ExperimentListData = InferType<typeof experimentListSchema>

export { overloadSchema, experimentListSchema }
export type { OverloadData, ExperimentListData }
